import upiProviderList from "../data/upiProviders.json";
import bankGazetteer from "../data/banks.json";
import nameStopwordList from "../data/nameStopwords.json";
import { ENTITY_TYPES, EntityType } from "../utils/types";

export type PatternDef = {
  name: string;
  regex: RegExp;
  /** Capture group holding the value; the whole match when omitted. */
  group?: number;
  /** Names only: keep the leading run of tokens that start with an uppercase letter. */
  capitalizedOnly?: boolean;
  /** Runs after the other patterns of its type, over text with their matches blanked out. */
  skipInsideLinks?: boolean;
};

export type BankEntry = {
  canonical: string;
  aliases: string[];
};

export type ExtractionCatalog = {
  readonly patterns: Readonly<Record<EntityType, readonly PatternDef[]>>;
  readonly upiProviders: ReadonlySet<string>;
  readonly banks: ReadonlyMap<string, string>;
  readonly nameStopwords: ReadonlySet<string>;
  readonly digitWords: ReadonlyMap<string, string>;
  readonly linkKeywords: readonly string[];
  readonly fileExtensions: readonly string[];
  /** Handle codes that only ever appear as UPI providers, never as mail domains. */
  readonly upiOnlyHandles: ReadonlySet<string>;
  /** TLDs a path-less bare domain may end in. */
  readonly commonTlds: ReadonlySet<string>;
  readonly honorifics: ReadonlySet<string>;
};

export type CatalogOptions = {
  extraUpiProviders?: readonly string[];
  extraBanks?: readonly BankEntry[];
};

const DIGIT_WORDS: Array<[string, string]> = [
  ["zero", "0"],
  ["oh", "0"],
  ["one", "1"],
  ["two", "2"],
  ["three", "3"],
  ["four", "4"],
  ["five", "5"],
  ["six", "6"],
  ["seven", "7"],
  ["eight", "8"],
  ["nine", "9"]
];

const LINK_KEYWORDS = ["bank", "pay", "kyc", "verify", "update", "secure", "claim"];

const UPI_ONLY_HANDLES = [
  "upi",
  "ybl",
  "ibl",
  "axl",
  "paytm",
  "okicici",
  "oksbi",
  "okhdfcbank",
  "okaxis",
  "apl",
  "yapl"
];

const COMMON_TLDS = [
  "com",
  "net",
  "org",
  "in",
  "co",
  "io",
  "info",
  "biz",
  "xyz",
  "online",
  "site",
  "top",
  "club",
  "app",
  "link",
  "live",
  "me",
  "cc",
  "tk",
  "ml",
  "ga",
  "cf",
  "gq",
  "shop",
  "store",
  "ly",
  "gl",
  "to",
  "ai"
];

const HONORIFICS = ["mr", "mrs", "ms", "miss", "dr", "shri", "sri", "smt", "kumari"];

const FILE_EXTENSIONS = [
  "pdf",
  "jpg",
  "jpeg",
  "png",
  "gif",
  "bmp",
  "webp",
  "doc",
  "docx",
  "xls",
  "xlsx",
  "ppt",
  "pptx",
  "txt",
  "csv",
  "zip",
  "rar",
  "mp3",
  "mp4",
  "exe"
];

const DIGIT_TOKEN = `(?:${DIGIT_WORDS.map(([word]) => word).join("|")}|\\d)`;
const PHONE_BODY = "(?:\\+?91[-\\s]?)?[6-9](?:[-\\s]?\\d){9}";
const NAME = "([a-z][a-z.'-]*(?:[ \\t]+[a-z][a-z.'-]*){0,3})";
const WA_TAIL = "(?:\\s*(?:no\\.?|number|num))?\\s*(?:is\\b)?\\s*[:#-]?\\s*(?:on\\s+)?";

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function spelledRun(min: number, max: number): RegExp {
  return new RegExp(`\\b(?:${DIGIT_TOKEN}\\b[\\s,-]*){${min},${max}}`, "gi");
}

function byLengthDesc(a: string, b: string): number {
  return b.length - a.length;
}

function buildPatterns(upiProviders: string[], bankAliases: string[]): Record<EntityType, PatternDef[]> {
  const providerAlt = [...upiProviders].sort(byLengthDesc).map(escapeRegex).join("|");
  const bankAlt = [...bankAliases].sort(byLengthDesc).map(escapeRegex).join("|");

  return {
    phoneNumbers: [
      { name: "plain", regex: /(?<![\d+])(?:\+91|91)?[6-9]\d{9}(?!\d)/g },
      { name: "grouped", regex: new RegExp(`(?<!\\d[-\\s]?)${PHONE_BODY}(?![-\\s]?\\d)`, "g") },
      { name: "bracketed_code", regex: /\(\s*\+?91\s*\)[-\s]?[6-9](?:[-\s]?\d){9}(?![-\s]?\d)/g },
      {
        name: "labeled",
        regex: /\b(?:phone|mobile|mob|cell|call|contact|helpline)\b\.?\s*(?:no\.?|number)?\s*(?:is\b)?\s*[:#-]?\s*(\+?\d[\d\s-]{8,15}\d)/gi,
        group: 1
      },
      { name: "spelled", regex: spelledRun(10, 12) }
    ],
    bankAccounts: [
      { name: "plain", regex: /\b\d{9,18}\b/g },
      { name: "grouped", regex: /\b\d{4}(?:[-\s]\d{4}){1,3}(?:[-\s]\d{1,6})?\b/g },
      {
        name: "labeled",
        regex: /(?:\ba\/c|\bacc(?:ount)?)\b\.?\s*(?:no\.?|number|num)?\s*(?:is\b)?\s*[:#-]?\s*(\d[\d\s-]{7,24}\d)/gi,
        group: 1
      },
      { name: "spelled", regex: spelledRun(9, 18) }
    ],
    upiIds: [
      {
        name: "known_provider",
        regex: new RegExp(`(?<![\\w.-])[a-z0-9._-]{2,}@(?:${providerAlt})(?![\\w-]|\\.[a-z0-9])`, "gi")
      },
      {
        name: "labeled",
        regex: /\bupi(?:\s*id)?\s*(?:is\b)?\s*[:=-]?\s*([a-z0-9._-]{2,}@[a-z][a-z0-9]*)(?![\w-]|\.[a-z0-9])/gi,
        group: 1
      }
    ],
    ifscCodes: [
      { name: "plain", regex: /\b[a-z]{4}0[a-z0-9]{6}\b/gi },
      {
        name: "labeled",
        regex: /\bifsc\b(?:\s*(?:code|no\.?|number))?\s*(?:is\b)?\s*[:=-]?\s*([a-z0-9]+(?:[\s-]+[a-z0-9]+){0,15})/gi,
        group: 1
      }
    ],
    emails: [{ name: "address", regex: /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi }],
    phishingLinks: [
      { name: "protocol", regex: /https?:\/\/[^\s<>"'{}|\\^`[\]]+/gi },
      { name: "upi_intent", regex: /upi:\/\/pay\?[^\s<>"']+/gi },
      {
        name: "bare_domain",
        skipInsideLinks: true,
        regex: /(?<![\w./-])(?:www\.)?[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)*\.[a-z]{2,24}(?::\d{2,5})?(?:\/[^\s<>"']*)?/gi
      }
    ],
    beneficiaryNames: [
      {
        name: "holder",
        regex: new RegExp(
          `\\b(?:account\\s+holder|a\\/c\\s+holder|beneficiary|payee)(?:\\s+name)?\\s*(?:is\\b)?\\s*[:=-]?\\s*["']?${NAME}`,
          "gi"
        ),
        group: 1
      },
      {
        name: "display",
        regex: new RegExp(
          `\\bname\\s+(?:will\\s+)?(?:show|display|appear)s?\\s+(?:as\\b)?\\s*[:=-]?\\s*["']?${NAME}`,
          "gi"
        ),
        group: 1
      },
      {
        name: "transfer_to",
        regex: new RegExp(
          `\\b(?:transfer|send|pay)\\s+(?:the\\s+)?(?:money\\s+|amount\\s+|rs\\.?\\s*\\d+\\s+)?to\\s+${NAME}`,
          "gi"
        ),
        group: 1,
        capitalizedOnly: true
      },
      {
        name: "introduction",
        regex: new RegExp(`\\b(?:my\\s+name\\s+is|name\\s+is)\\s*[:=-]?\\s*["']?${NAME}`, "gi"),
        group: 1
      },
      {
        name: "casual_introduction",
        regex: new RegExp(`\\b(?:this\\s+is|i\\s+am|i'm)\\s+${NAME}`, "gi"),
        group: 1,
        capitalizedOnly: true
      },
      {
        name: "naam_hai",
        regex: new RegExp(`\\b(?:(?:mera|mere|meraa)\\s+)?naam\\s+(?:hai\\s+)?[:=-]?\\s*${NAME}`, "gi"),
        group: 1
      },
      {
        name: "titled",
        regex: /["']([A-Za-z][a-z]+(?:[ \t]+[A-Za-z][a-z]+){0,2})["']?\s*[-–]\s*(?:KYC|Support|Officer|Manager|Executive|Agent|Verification)/gi,
        group: 1,
        capitalizedOnly: true
      },
      {
        name: "signature",
        regex: new RegExp(`(?:^|[ \\t])[-–—][ \\t]*${NAME}[ \\t]*$`, "gim"),
        group: 1,
        capitalizedOnly: true
      },
      { name: "just_quoted", regex: new RegExp(`\\bjust\\s+["']${NAME}["']`, "gi"), group: 1 }
    ],
    bankNames: [{ name: "gazetteer", regex: new RegExp(`(?<![\\w&])(?:${bankAlt})(?![\\w&])`, "gi") }],
    whatsappNumbers: [
      {
        name: "labeled",
        regex: new RegExp(`\\b(?:whats\\s*app|wa)\\b${WA_TAIL}(${PHONE_BODY})(?![-\\s]?\\d)`, "gi"),
        group: 1
      },
      {
        name: "reach_on",
        regex: new RegExp(
          `\\b(?:message|msg|contact|call|reach|ping)\\s+(?:me\\s+)?(?:on|at|via)\\s+(?:my\\s+)?whats\\s*app\\b${WA_TAIL}(${PHONE_BODY})(?![-\\s]?\\d)`,
          "gi"
        ),
        group: 1
      },
      {
        name: "send_to",
        regex: new RegExp(
          `\\b(?:send|share)\\s+(?:it\\s+|the\\s+)?(?:screenshot\\s+|ss\\s+|proof\\s+)?(?:to|on)\\s+(?:my\\s+)?whats\\s*app\\b${WA_TAIL}(${PHONE_BODY})(?![-\\s]?\\d)`,
          "gi"
        ),
        group: 1
      },
      { name: "wa_me_link", regex: /wa\.me\/(?:\+?91)?([6-9]\d{9})(?!\d)/gi, group: 1 }
    ]
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof RegExp) && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Capturing patterns also report where their group sits in the match. */
function withCaptureIndices(def: PatternDef): PatternDef {
  if (!def.group || def.regex.hasIndices) return def;
  return { ...def, regex: new RegExp(def.regex.source, `${def.regex.flags}d`) };
}

export function buildCatalog(options: CatalogOptions = {}): ExtractionCatalog {
  const providers = Array.from(
    new Set(
      [...upiProviderList, ...(options.extraUpiProviders || [])]
        .map((p) => p.trim().toLowerCase())
        .filter((p) => /^[a-z][a-z0-9]*$/.test(p))
    )
  );

  const banks = new Map<string, string>();
  for (const entry of [...bankGazetteer, ...(options.extraBanks || [])]) {
    for (const alias of [entry.canonical, ...entry.aliases]) {
      banks.set(alias.toLowerCase(), entry.canonical);
    }
  }

  const patterns = buildPatterns(providers, Array.from(banks.keys()));
  for (const type of ENTITY_TYPES) {
    patterns[type] = patterns[type].map(withCaptureIndices);
  }

  return deepFreeze({
    patterns,
    upiProviders: new Set(providers),
    banks,
    nameStopwords: new Set(nameStopwordList.map((w) => w.toLowerCase())),
    digitWords: new Map(DIGIT_WORDS),
    linkKeywords: LINK_KEYWORDS,
    fileExtensions: FILE_EXTENSIONS,
    upiOnlyHandles: new Set(UPI_ONLY_HANDLES),
    commonTlds: new Set(COMMON_TLDS),
    honorifics: new Set(HONORIFICS)
  });
}

export const defaultCatalog: ExtractionCatalog = buildCatalog();
