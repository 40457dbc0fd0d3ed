import { randomUUID } from "crypto";
import { log } from "../lib/utils.js";

export const LABEL_ID_LENGTH = 8;
const MAX_ATTEMPTS = 5;

export function newLabelId(): string {
  return randomUUID().slice(0, LABEL_ID_LENGTH);
}

/**
 * 8 文字 ID を発行。既存と衝突したら引き直す（最大 MAX_ATTEMPTS 回）。
 * 確認と INSERT の間の競合は PK 制約で検出される。
 */
export function generateLabelId(
  isTaken: (id: string) => boolean,
  next: () => string = newLabelId,
  attempts = MAX_ATTEMPTS
): string {
  for (let i = 0; i < attempts; i++) {
    const id = next();
    if (!isTaken(id)) return id;
    log(`label id collision: ${id} (attempt ${i + 1}/${attempts})`);
  }
  throw new Error(`no free label id after ${attempts} attempts`);
}
