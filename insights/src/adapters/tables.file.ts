import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { type HeuristicTables, parseHeuristicTables } from "../core/tables";

export const DEFAULT_TABLES_PATH = fileURLToPath(
  new URL("../config/heuristics.json", import.meta.url)
);

export function loadHeuristicTables(
  path: string = DEFAULT_TABLES_PATH
): HeuristicTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new Error(`Failed to read heuristic tables from ${path}`, {
      cause: error,
    });
  }
  return parseHeuristicTables(raw);
}
