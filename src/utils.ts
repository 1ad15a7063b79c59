import { execFile } from "node:child_process";

export function clampInt(n: number, min: number, max: number): number {
  return Math.min(Math.max(Math.trunc(n), min), max);
}

export function sanitizeForLog(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function binaryExists(name: string): Promise<boolean> {
  const cmd = process.platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}
