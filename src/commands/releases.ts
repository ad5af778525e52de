import { Command } from "commander";
import {
  formatReleasesAsJson,
  formatReleasesAsText,
  readReleaseSnapshot,
  type OutputFormat,
} from "../discovery";
import { loadConfig } from "../lib/config";

type ReleasesOptions = {
  format?: string;
};

function normalizeFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "json" || normalized === "text") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

export function runReleases(options: ReleasesOptions): void {
  const format = normalizeFormat(options.format);
  const config = loadConfig();
  const releases = readReleaseSnapshot(config.state.releases_path);
  console.log(
    format === "json" ? formatReleasesAsJson(releases) : formatReleasesAsText(releases)
  );
}

export function registerReleasesCommand(program: Command): void {
  program
    .command("releases")
    .description("Show the ranked releases from the last run")
    .option("--format <format>", "Output format (text|json)", "text")
    .action((options: ReleasesOptions) => runReleases(options));
}
