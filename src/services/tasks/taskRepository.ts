import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { DatabaseConfig } from '../../configLoader';
import { log, LogLevel } from '../../logger';
import {
  NewTaskPayload,
  Task,
  TaskCountFilter,
  TaskListQuery,
  TaskTextSource,
  UpdateTaskArgs,
} from '../../types/task';

const IN_MEMORY = ':memory:';

// Columns a caller may change through updateTask, in SET clause order.
const UPDATABLE_COLUMNS = ['title', 'description', 'due_date', 'status'] as const;

function ensureDbDirectory(dbPath: string): void {
  const dbDir = path.dirname(dbPath);
  if (!fs.existsSync(dbDir)) {
    fs.mkdirSync(dbDir, { recursive: true });
    log(LogLevel.INFO, `TaskRepository: Created database directory at ${dbDir}`);
  }
}

export class TaskRepository implements TaskTextSource {
  private db: Database.Database;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  public static create(config: DatabaseConfig): TaskRepository {
    let db: Database.Database;
    if (config.path === IN_MEMORY) {
      db = new Database(IN_MEMORY);
    } else {
      const dbPath = path.resolve(process.cwd(), config.path);
      ensureDbDirectory(dbPath);
      db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
    }

    const repo = new TaskRepository(db);
    repo.initDatabase();
    log(LogLevel.INFO, `TaskRepository: Database connected at ${config.path}`);
    return repo;
  }

  private initDatabase(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        description TEXT,
        due_date TEXT,
        status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'in_progress', 'completed')),
        creation_date TEXT NOT NULL,
        modified_date TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_title ON tasks(title);
      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
    `);
    log(LogLevel.DEBUG, "TaskRepository: 'tasks' table ensured.");
  }

  createTask(payload: NewTaskPayload, now: Date = new Date()): Task {
    const timestamp = now.toISOString();
    const info = this.db
      .prepare(
        `INSERT INTO tasks (title, description, due_date, status, creation_date, modified_date)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(payload.title, payload.description ?? null, payload.due_date ?? null, payload.status, timestamp, timestamp);

    const id = Number(info.lastInsertRowid);
    const created = this.getTaskById(id);
    if (!created) {
      throw new Error(`Task ${id} was not found after insert.`);
    }
    log(LogLevel.INFO, `TaskRepository: Added task with ID: ${id}`);
    return created;
  }

  getTaskById(id: number): Task | undefined {
    return this.db.prepare<[number], Task>('SELECT * FROM tasks WHERE id = ?').get(id);
  }

  listTasks(query: TaskListQuery): Task[] {
    const clauses: string[] = [];
    const params: string[] = [];

    if (query.status) {
      clauses.push('status = ?');
      params.push(query.status);
    }
    if (query.due_date_from) {
      clauses.push('due_date >= ?');
      params.push(`${query.due_date_from}T00:00:00.000Z`);
    }
    if (query.due_date_to) {
      clauses.push('due_date <= ?');
      params.push(`${query.due_date_to}T23:59:59.999Z`);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    // sort_by and sort_order are validated enums, never raw user text.
    const direction = query.sort_order === 'asc' ? 'ASC' : 'DESC';
    const sql = `SELECT * FROM tasks${where} ORDER BY ${query.sort_by} ${direction}, id ${direction}`;

    return this.db.prepare<string[], Task>(sql).all(...params);
  }

  updateTask(id: number, updates: UpdateTaskArgs, now: Date = new Date()): Task | undefined {
    const columns = UPDATABLE_COLUMNS.filter((column) => updates[column] !== undefined);
    const values = columns.map((column) => updates[column] ?? null);

    const setClauses = [...columns.map((column) => `${column} = ?`), 'modified_date = ?'].join(', ');
    const info = this.db
      .prepare(`UPDATE tasks SET ${setClauses} WHERE id = ?`)
      .run(...values, now.toISOString(), id);

    if (info.changes === 0) {
      return undefined;
    }
    log(LogLevel.INFO, `TaskRepository: Updated task with ID: ${id}`, { fields: columns });
    return this.getTaskById(id);
  }

  deleteTask(id: number): boolean {
    const info = this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id);
    if (info.changes > 0) {
      log(LogLevel.INFO, `TaskRepository: Deleted task with ID: ${id}`);
      return true;
    }
    return false;
  }

  countTasks(filter: TaskCountFilter = {}): number {
    const clauses: string[] = [];
    const params: string[] = [];

    if (filter.status) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    if (filter.excludeStatus) {
      clauses.push('status != ?');
      params.push(filter.excludeStatus);
    }
    if (filter.dueFrom) {
      clauses.push('due_date >= ?');
      params.push(filter.dueFrom);
    }
    if (filter.dueTo) {
      clauses.push('due_date <= ?');
      params.push(filter.dueTo);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    const row = this.db.prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM tasks${where}`).get(...params);
    return row?.total ?? 0;
  }

  listTitles(): string[] {
    return this.db
      .prepare<[], { title: string }>('SELECT title FROM tasks WHERE title IS NOT NULL ORDER BY id')
      .all()
      .map((row) => row.title);
  }

  listDescriptions(): string[] {
    return this.db
      .prepare<[], { description: string }>('SELECT description FROM tasks WHERE description IS NOT NULL ORDER BY id')
      .all()
      .map((row) => row.description);
  }

  close(): void {
    this.db.close();
    log(LogLevel.INFO, 'TaskRepository: Database connection closed.');
  }
}
