import { sql } from "drizzle-orm";
import { sqliteTable, text } from "drizzle-orm/sqlite-core";

export const labels = sqliteTable("labels", {
  id: text("id").primaryKey(),
  data: text("data").notNull(),
  createdAt: text("created_at").notNull().default(sql`CURRENT_TIMESTAMP`),
});

export type LabelRow = typeof labels.$inferSelect;
export type LabelInsert = typeof labels.$inferInsert;

/* drizzle のスキーマと同じ形。init() で毎回流す（IF NOT EXISTS） */
export const CREATE_LABELS_TABLE = `
  CREATE TABLE IF NOT EXISTS labels (
    id TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );
`;
