/**
 * Scores how well a free-text target names a candidate element, 0..100.
 * Kept behind an interface so the resolver can run with a different strategy.
 */
export interface MatchScorer {
  score(target: string, candidateName: string): number;
}

export const MATCH_THRESHOLD = 60;

export const DEFAULT_STOPWORDS = [
  "app",
  "icon",
  "button",
  "the",
  "a",
  "an",
  "click",
  "tap",
  "open",
  "launch",
  "打开",
  "点击",
  "按钮",
  "图标",
];

/** Listing prefixes that label a result's type rather than its name. */
export const CATEGORY_PREFIXES = ["单曲", "歌曲", "专辑", "视频", "音乐"];

const ORDINAL_PATTERNS: Array<[RegExp, number]> = [
  [/\b(first|1st)\b|第一/i, 1],
  [/\b(second|2nd)\b|第二/i, 2],
  [/\b(third|3rd)\b|第三/i, 3],
  [/\b(fourth|4th)\b|第四/i, 4],
  [/\b(fifth|5th)\b|第五/i, 5],
  [/\blast\b|最后/i, -1],
];

const ORDINAL_WORDS = /\b(first|second|third|fourth|fifth|1st|2nd|3rd|4th|5th|last)\b|第[一二三四五]个?|最后一?个?/gi;

const LOCATION_SUFFIX = /@\(\d+,\d+\)(#\d+)?$/;

export function stripLocationSuffix(name: string) {
  return name.replace(LOCATION_SUFFIX, "");
}

export function stripCategoryPrefix(name: string) {
  let result = name.trim();
  for (const prefix of CATEGORY_PREFIXES) {
    if (result.startsWith(prefix)) {
      result = result.slice(prefix.length).replace(/^[\s:：\-·]+/, "");
    }
  }
  return result;
}

export function normalizeName(value: string) {
  return value.toLowerCase().replace(/[\s\p{P}\p{S}]+/gu, "");
}

export function extractKeywords(text: string, stopwords: readonly string[] = DEFAULT_STOPWORDS) {
  const stop = new Set(stopwords.map((w) => w.toLowerCase()));
  return text
    .toLowerCase()
    .replace(ORDINAL_WORDS, " ")
    .split(/[\s\p{P}\p{S}]+/u)
    .map((word) => word.trim())
    .filter((word) => word.length > 0 && !stop.has(word));
}

/** 1-based ordinal mentioned in `text`, -1 for "last", null when there is none. */
export function parseOrdinal(text: string): number | null {
  for (const [pattern, ordinal] of ORDINAL_PATTERNS) {
    if (pattern.test(text)) return ordinal;
  }
  return null;
}

export function stripOrdinalWords(text: string) {
  return text.replace(ORDINAL_WORDS, " ").replace(/\s+/g, " ").trim();
}

const containsEitherWay = (a: string, b: string) =>
  a.length >= 2 && b.length >= 2 && (a.includes(b) || b.includes(a));

/**
 * Tiered scorer: exact 100, substring 80, substring after dropping category
 * prefixes and punctuation 70, shared keyword 60.
 */
export class KeywordMatchScorer implements MatchScorer {
  private readonly stopwords: readonly string[];

  constructor(stopwords: readonly string[] = DEFAULT_STOPWORDS) {
    this.stopwords = stopwords;
  }

  score(target: string, candidateName: string): number {
    const t = target.trim().toLowerCase();
    const c = stripLocationSuffix(candidateName.trim()).toLowerCase();
    if (!t || !c) return 0;
    if (t === c) return 100;
    if (containsEitherWay(t, c)) return 80;

    const nt = normalizeName(stripCategoryPrefix(t));
    const nc = normalizeName(stripCategoryPrefix(c));
    if (nt && nc && (nt === nc || containsEitherWay(nt, nc))) return 70;

    const targetWords = extractKeywords(t, this.stopwords);
    if (targetWords.length === 0) return 0;
    const candidateWords = new Set(extractKeywords(c, this.stopwords));
    if (targetWords.some((word) => candidateWords.has(word) || (word.length >= 2 && c.includes(word)))) {
      return 60;
    }
    return 0;
  }
}
