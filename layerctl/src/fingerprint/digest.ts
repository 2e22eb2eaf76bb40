import { createHash } from "node:crypto";

/** Lowercase hex SHA-256; strings are hashed as UTF-8. */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
