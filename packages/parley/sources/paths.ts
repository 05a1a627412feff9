import os from "node:os";
import path from "node:path";

export const DEFAULT_PARLEY_DIR = path.join(os.homedir(), ".parley");

export function resolveParleyPath(...segments: string[]): string {
    return path.join(DEFAULT_PARLEY_DIR, ...segments);
}
