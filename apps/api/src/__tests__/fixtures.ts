import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';

export const MESSAGES_DDL = `
  CREATE TABLE messages (id INTEGER PRIMARY KEY, sender_id INT, recipient_id INT, body TEXT, sent_at INTEGER);
  INSERT INTO messages VALUES (1, 10, 20, 'contact me at a@b.com', 1700000000);
`;

export const memoryDb = (ddl: string) => {
  const db = new Database(':memory:');
  db.exec(ddl);
  return db;
};

export const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'evidence-test-'));

export const writeDbFile = (dir: string, name: string, ddl: string) => {
  const file = path.join(dir, name);
  const db = new Database(file);
  db.exec(ddl);
  db.close();
  return file;
};
