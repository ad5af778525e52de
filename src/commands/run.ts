import { Command } from "commander";
import { loadConfig, requireCatalogCredentials } from "../lib/config";
import { setQuiet } from "../lib/logger";
import { formatRunSummary, runPipeline } from "../pipeline";
import { createLastFmClient } from "../providers/lastfm";
import { createSelfPingClient, type Messenger } from "../providers/selfping";
import { SpotifyClient } from "../services/spotify";
import { RefreshTokenProvider } from "../services/spotifyAuth";

type RunOptions = {
  dryRun?: boolean;
  quiet?: boolean;
};

export async function runTracker(options: RunOptions): Promise<void> {
  const dryRun = options.dryRun ?? false;
  setQuiet(options.quiet ?? false);

  const config = loadConfig();
  const credentials = requireCatalogCredentials(config);

  const catalog = new SpotifyClient(new RefreshTokenProvider(credentials));
  const playCounts = createLastFmClient({
    apiKey: config.lastfm.api_key,
    username: config.lastfm.username,
  });
  const messenger: Messenger | null = config.selfping.api_key
    ? createSelfPingClient({
        apiKey: config.selfping.api_key,
        endpoint: config.selfping.endpoint,
      })
    : null;

  const output: string[] = [];
  output.push(
    `Release tracker run for ${new Date().toISOString().slice(0, 10)}${dryRun ? " (dry run)" : ""}...`
  );

  const summary = await runPipeline({
    config,
    catalog,
    playCounts,
    messenger,
    dryRun,
  });

  output.push(formatRunSummary(summary, dryRun));
  console.log(output.join("\n"));
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Scan the library, update the release playlist and notify")
    .option("--dry-run", "Log intended playlist changes and message without applying them")
    .option("--quiet", "Only print warnings and the final summary")
    .action(async (options: RunOptions) => {
      await runTracker(options);
    });
}
