import Database from 'better-sqlite3';
import logger from './logger';

let db: Database.Database | null = null;

export const SCHEMA = `
    CREATE TABLE IF NOT EXISTS face_quality (
      photo_id TEXT NOT NULL,
      detection_index INTEGER NOT NULL,
      face_id TEXT NOT NULL,
      photo_timestamp TEXT NOT NULL,
      box_x REAL NOT NULL,
      box_y REAL NOT NULL,
      box_width REAL NOT NULL,
      box_height REAL NOT NULL,
      capture_quality REAL NOT NULL,
      left_eye_open INTEGER NOT NULL,
      right_eye_open INTEGER NOT NULL,
      eye_confidence REAL NOT NULL,
      expression_intensity REAL NOT NULL,
      expression_naturalness REAL NOT NULL,
      expression_confidence REAL NOT NULL,
      pitch REAL NOT NULL,
      yaw REAL NOT NULL,
      roll REAL NOT NULL,
      sharpness REAL NOT NULL,
      composite_score REAL NOT NULL,
      rank INTEGER NOT NULL,
      analyzed_at TEXT DEFAULT CURRENT_TIMESTAMP,
      PRIMARY KEY (photo_id, detection_index)
    );

    CREATE INDEX IF NOT EXISTS idx_face_quality_score ON face_quality(composite_score);
`;

export function initDB(dbPath: string): Database.Database {
  if (db) return db;
  logger.info('Initializing Database at:', dbPath);

  db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  return db;
}

export function getDB(): Database.Database {
  if (!db) throw new Error('Database not initialized; call initDB first');
  return db;
}

export function isDBInitialized(): boolean {
  return db !== null;
}

export function closeDB() {
  if (!db) return;
  db.close();
  db = null;
}
