#!/usr/bin/env node

import { parseArgs } from "./args";
import { batch } from "./commands/batch";
import { catalog } from "./commands/catalog";
import { generate } from "./commands/generate";
import { fatal, print } from "./output";

const VERSION = "0.1.0";

const HELP = `viewgen — generate terraform.tfvars for filtered BigQuery views

Usage: viewgen [command] [options]

Commands:
  generate                 Ask for inputs interactively and write the file (default)
  batch <input.json>       Generate from a JSON input document
  catalog                  Show source datasets and table filter columns

Options:
  --out <file>             Output filename (default: terraform.tfvars)
  --catalog <file>         Catalog JSON to use instead of the built-in one
  --escape-quotes          Escape quotes in filter values and strings
  --verbose                Print debug logs to stderr
  --remember               Save project id, region and view prefix as defaults (generate)
  --stdout                 Print to stdout instead of writing a file (batch)

General:
  --help, -h               Show this help message
  --version, -v            Show version

Defaults are read from ~/.viewgen/config.json.

Examples:
  viewgen
  viewgen generate --out envs/prod/terraform.tfvars --remember
  viewgen batch acme.json --stdout
  viewgen catalog --catalog catalog.json
`;

async function main(): Promise<void> {
	const { command, flags, positional } = parseArgs(process.argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return;
	}

	if (flags.help === "true" || flags.h === "true") {
		print(HELP);
		return;
	}

	const cmd = command.join(" ") || "generate";

	switch (cmd) {
		case "generate":
			await generate(flags);
			break;

		case "batch":
			batch(flags, positional);
			break;

		case "catalog":
			catalog(flags);
			break;

		case "help":
			print(HELP);
			break;

		case "version":
			print(VERSION);
			break;

		default:
			fatal(`Unknown command: ${cmd}\nRun 'viewgen --help' for usage.`);
	}
}

main().catch((err) => {
	fatal(String(err));
});
