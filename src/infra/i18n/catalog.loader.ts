import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

import type { MessageCatalog } from "./translator";

const MessageCatalogSchema = z.record(z.string(), z.string());

/**
 * Reads every `<locale>.json` in `dir` as a flat key -> message map.
 */
export function loadCatalogs(dir: string): Record<string, MessageCatalog> {
	const catalogs: Record<string, MessageCatalog> = {};

	const files = readdirSync(dir)
		.filter((f) => f.endsWith(".json"))
		.sort();

	for (const file of files) {
		const locale = path.basename(file, ".json");
		const raw: unknown = JSON.parse(readFileSync(path.join(dir, file), "utf8"));

		const parsed = MessageCatalogSchema.safeParse(raw);
		if (!parsed.success) {
			throw new Error(
				`[i18n] Invalid message catalog "${file}": ${parsed.error.message}`
			);
		}

		catalogs[locale] = parsed.data;
	}

	return catalogs;
}
