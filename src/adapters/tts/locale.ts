/**
 * Map the short language hints used in config (yue, en, zh) to provider locales.
 * Full locales (yue-HK, en-US) pass through untouched.
 */

const GOOGLE_LOCALES: Record<string, string> = {
  yue: "yue-HK",
  zh: "cmn-CN",
  en: "en-US",
  ja: "ja-JP",
};

const AZURE_LOCALES: Record<string, string> = {
  yue: "zh-HK",
  zh: "zh-CN",
  en: "en-US",
  ja: "ja-JP",
};

function resolve(table: Record<string, string>, language: string | undefined, fallback: string): string {
  if (!language) return fallback;
  if (language.includes("-")) return language;
  return table[language.toLowerCase()] ?? fallback;
}

export function googleLocale(language: string | undefined): string {
  return resolve(GOOGLE_LOCALES, language, "yue-HK");
}

export function azureLocale(language: string | undefined): string {
  return resolve(AZURE_LOCALES, language, "zh-HK");
}
