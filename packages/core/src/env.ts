import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { refreshLoggerSettings } from "./utils/logger";

const loaded = new Set<string>();

export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = filterUnique(
		[process.env.TICKSCOPE_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});

	if (applied.length) {
		refreshLoggerSettings();
	}
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
