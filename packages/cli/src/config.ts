import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { isNonEmptyString, isRecord } from "@viewgen/core";

/** User defaults stored at ~/.viewgen/config.json */
export interface CliConfig {
	/** Default GCP project id offered at the first prompt */
	projectId?: string;
	region?: string;
	viewPrefix?: string;
	/** Default output filename */
	outputFile?: string;
	/** Catalog JSON used instead of the built-in catalog */
	catalogPath?: string;
}

const CONFIG_KEYS = ["projectId", "region", "viewPrefix", "outputFile", "catalogPath"] as const;

function configDir(): string {
	return join(homedir(), ".viewgen");
}

function configFile(): string {
	return join(configDir(), "config.json");
}

/** Load the CLI configuration file. Returns empty config if not found or unreadable. */
export function loadConfig(): CliConfig {
	const file = configFile();
	if (!existsSync(file)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(file, "utf-8"));
	} catch {
		return {};
	}
	if (!isRecord(parsed)) return {};

	const config: CliConfig = {};
	for (const key of CONFIG_KEYS) {
		const value = parsed[key];
		if (isNonEmptyString(value)) {
			config[key] = value;
		}
	}
	return config;
}

/** Save the CLI configuration file. Creates ~/.viewgen/ if it does not exist. */
export function saveConfig(config: CliConfig): void {
	const dir = configDir();
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}
	writeFileSync(configFile(), `${JSON.stringify(config, null, "\t")}\n`, "utf-8");
}

/** Get the config file path. */
export function getConfigFile(): string {
	return configFile();
}
