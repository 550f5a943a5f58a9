export type MessageCatalog = Readonly<Record<string, string>>;

export type TranslationParameters = Readonly<Record<string, string>>;

export interface Translator {
	readonly defaultLocale: string;
	readonly locales: readonly string[];
	trans(key: string, parameters?: TranslationParameters, locale?: string): string;
}

/**
 * In-memory translator over flat key -> message catalogs.
 *
 * Missing keys fall back to the default locale, then to the key itself, so an
 * untranslated user-error still shows something meaningful.
 */
export class CatalogTranslator implements Translator {
	public readonly defaultLocale: string;
	public readonly locales: readonly string[];
	private readonly catalogs: ReadonlyMap<string, MessageCatalog>;

	constructor(options: {
		catalogs: Readonly<Record<string, MessageCatalog>>;
		defaultLocale: string;
	}) {
		this.catalogs = new Map(Object.entries(options.catalogs));
		this.defaultLocale = options.defaultLocale;
		this.locales = [...this.catalogs.keys()];
	}

	trans(key: string, parameters: TranslationParameters = {}, locale?: string): string {
		const message =
			this.lookup(locale ?? this.defaultLocale, key) ??
			this.lookup(this.defaultLocale, key) ??
			key;

		return replacePlaceholders(message, parameters);
	}

	private lookup(locale: string, key: string): string | undefined {
		const catalog = this.catalogs.get(locale);
		if (!catalog || !Object.hasOwn(catalog, key)) return undefined;
		return catalog[key];
	}
}

/**
 * Single pass, longest placeholder first: substituted text is never rescanned.
 */
export function replacePlaceholders(
	message: string,
	parameters: TranslationParameters
): string {
	const placeholders = Object.keys(parameters)
		.filter((p) => p.length > 0)
		.sort((a, b) => b.length - a.length);
	if (placeholders.length === 0) return message;

	const pattern = new RegExp(placeholders.map(escapeRegExp).join("|"), "g");
	return message.replace(pattern, (match) => parameters[match] ?? match);
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
