import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";

/**
 * Write the rendered document as UTF-8, creating parent directories
 */
export function writeOutputFile(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, "utf-8");
}
