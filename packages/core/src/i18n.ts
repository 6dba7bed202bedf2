import en from '../locales/en.json';
import tr from '../locales/tr.json';

export type MessageCatalog = Record<string, string>;

export interface TranslateOptions {
  locale?: string;
  values?: Record<string, unknown>;
}

export interface Translator {
  translate: (key: string, options?: TranslateOptions) => string;
  resolveLocale: (locale?: string) => string;
  locales: () => string[];
}

const interpolate = (template: string, values: Record<string, unknown> = {}): string =>
  template.replace(/\{\{\s*([\w.-]+)\s*\}\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined || value === null) {
      return '';
    }
    // Pattern lists and path lists read better comma separated.
    return Array.isArray(value) ? value.map(String).join(', ') : String(value);
  });

export const createTranslator = (
  catalogs: Record<string, MessageCatalog>,
  defaultLocale: string,
): Translator => {
  const byLocale = new Map(
    Object.entries(catalogs).map(([locale, catalog]) => [locale.toLowerCase(), catalog] as const),
  );
  const fallback = defaultLocale.toLowerCase();
  if (!byLocale.has(fallback)) {
    throw new Error(`Default locale "${defaultLocale}" has no message catalog.`);
  }

  const resolveLocale = (locale?: string): string => {
    const requested = locale?.trim().toLowerCase();
    if (!requested) {
      return fallback;
    }
    if (byLocale.has(requested)) {
      return requested;
    }
    const [base] = requested.split(/[-_]/);
    return base && byLocale.has(base) ? base : fallback;
  };

  const translate = (key: string, options: TranslateOptions = {}): string => {
    const template = byLocale.get(resolveLocale(options.locale))?.[key] ?? byLocale.get(fallback)?.[key];
    return template === undefined ? key : interpolate(template, options.values);
  };

  return {
    translate,
    resolveLocale,
    locales: () => Array.from(byLocale.keys()),
  };
};

const builtin = createTranslator({ en, tr }, 'en');

export const DEFAULT_LOCALE = builtin.resolveLocale();

export const translate = (key: string, options?: TranslateOptions): string =>
  builtin.translate(key, options);

export const resolveLocale = (locale?: string): string => builtin.resolveLocale(locale);

export const getAvailableLocales = (): string[] => builtin.locales();
