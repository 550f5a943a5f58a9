/**
 * Picks the first supported language from an Accept-Language header,
 * honouring q-weights. Region subtags are ignored: "nl-BE" selects "nl".
 */
export function negotiateLocale(
	acceptLanguage: string | undefined,
	locales: readonly string[],
	fallback: string
): string {
	if (!acceptLanguage) return fallback;

	const supported = new Set(locales.map((l) => l.toLowerCase()));

	const ranked = acceptLanguage
		.split(",")
		.map((part, index) => {
			const [tag = "", ...params] = part.trim().split(";");
			const q = params
				.map((p) => p.trim())
				.find((p) => p.startsWith("q="));
			const weight = q ? Number(q.slice(2)) : 1;
			return {
				language: tag.trim().split("-")[0]?.toLowerCase() ?? "",
				weight: Number.isFinite(weight) ? weight : 0,
				index,
			};
		})
		.filter((r) => r.language.length > 0 && r.weight > 0)
		.sort((a, b) => b.weight - a.weight || a.index - b.index);

	for (const r of ranked) {
		if (supported.has(r.language)) {
			return locales.find((l) => l.toLowerCase() === r.language) ?? fallback;
		}
	}

	return fallback;
}
