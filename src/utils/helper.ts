import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function errorCode(error: unknown) {
  if (!(error instanceof Error) || !("code" in error)) return undefined;
  return error.code;
}

export function isNotFound(error: unknown) {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

export function isAlreadyExists(error: unknown) {
  return errorCode(error) === "EEXIST";
}

export function endsWithSeparator(p: string) {
  return p.endsWith("/") || p.endsWith(path.sep);
}
