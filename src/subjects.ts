// src/subjects.ts

/** How a subject is priced and which scoring factors apply to it. */
export type SubjectClass = "domestic" | "hongkong" | "overseas";

export type SubjectInfo = {
  name: string;
  klass: SubjectClass;
  /** Text-quote feed code, e.g. "sh000300" */
  sinaCode?: string;
  /** Chart feed symbol, e.g. "^GSPC" */
  yahooCode?: string;
};

/** Tracked indices keyed by subject id. */
export const INDEX_MAPPING: Record<string, SubjectInfo> = {
  csi300: { name: "CSI 300", klass: "domestic", sinaCode: "sh000300" },
  star50: { name: "STAR 50", klass: "domestic", sinaCode: "sh000688" },
  hsi: { name: "Hang Seng Index", klass: "hongkong", sinaCode: "hkHSI" },
  hstech: { name: "Hang Seng TECH", klass: "hongkong", sinaCode: "hkHSTECH" },
  sp500: { name: "S&P 500", klass: "overseas", yahooCode: "^GSPC" },
  nasdaq100: { name: "Nasdaq 100", klass: "overseas", yahooCode: "^NDX" },
};

export const SUBJECTS = Object.keys(INDEX_MAPPING);

/** QDII funds per index family. */
export const TRACKED_FUNDS: Record<string, string[]> = {
  sp500: ["513500", "159612", "513650", "513850"],
  nasdaq100: ["513100", "159941", "513300", "159632"],
  hsi: ["159920", "513660", "513030"],
  hstech: ["513180", "513130", "159740"],
};

export const FAMILY_DESCRIPTIONS: Record<string, string> = {
  sp500: "S&P 500 index",
  nasdaq100: "Nasdaq 100 index",
  hsi: "Hang Seng index",
  hstech: "Hang Seng TECH index",
};

export const ALL_TRACKED_CODES = new Set(Object.values(TRACKED_FUNDS).flat());

export function familyOf(fundCode: string): string | null {
  for (const [family, codes] of Object.entries(TRACKED_FUNDS)) {
    if (codes.includes(fundCode)) return family;
  }
  return null;
}

/** Subjects whose premium factor is scored (hstech has no mapping). */
export const PREMIUM_SCORED: ReadonlySet<string> = new Set([
  "sp500",
  "nasdaq100",
  "hsi",
]);

/** Subject tags used by flow alerts. */
export const NORTH_FLOW_SUBJECT = "csi300";
export const SOUTH_FLOW_SUBJECT = "hsi";
