#!/usr/bin/env node

import { Command } from "commander";
import { registerArtistsCommand } from "./commands/artists";
import { registerReleasesCommand } from "./commands/releases";
import { registerRunCommand } from "./commands/run";

const program = new Command();

program
  .name("release-tracker")
  .description("Keep a playlist of new releases from the artists you like")
  .version("1.0.0");

registerRunCommand(program);
registerArtistsCommand(program);
registerReleasesCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
