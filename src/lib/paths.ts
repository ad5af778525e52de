import os from "os";
import path from "path";

export function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), ".config", "release-tracker", "config.yaml");
}

export function defaultStateDir(): string {
  return path.join(os.homedir(), ".local", "share", "release-tracker");
}
