import { promises as fs } from "fs";
import { parse } from "dotenv";
import type { EnvSource } from "../config.js";

/**
 * Process environment overlaid with the values of a `.env` file; the file wins, a missing
 * file is ignored.
 */
export async function loadEnv(dotenvPath: string, base: EnvSource): Promise<EnvSource> {
  let raw: string;
  try {
    raw = await fs.readFile(dotenvPath, "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { ...base };
    }
    throw error;
  }
  return { ...base, ...parse(raw) };
}
