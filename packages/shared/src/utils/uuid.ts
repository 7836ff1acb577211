import { randomUUID } from "node:crypto";

/** Random v4 UUID, used to tag the log lines of one turn. */
export function generateId(): string {
  return randomUUID();
}
