import os from "node:os";
import path from "node:path";

export function expandHome(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === "~") return homeDir;
  if (inputPath.startsWith("~/")) return path.join(homeDir, inputPath.slice(2));
  return inputPath;
}
