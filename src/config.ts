import { z } from "zod";

/** Tuned constants of the heading heuristics. Changing them is a tuning decision. */
export interface HeuristicConfig {
  /** Line builder: gap (× font size) between glyphs that implies a space. */
  spaceGapRatio: number;

  /** Calibrator: sizes whose lines average fewer chars than this are heading sizes. */
  headingSizeMaxAvgLength: number;
  headingSizeKeywords: string[];

  minLineLength: number;
  maxLineLength: number;
  /** Font band contributions for H1, H2, H3 and below-H3. */
  bandWeights: [number, number, number, number];
  /** A pattern's level replaces the band level only above this boost. */
  patternLevelCutoff: number;
  boldBonus: number;
  leftAlignedBonus: number;
  leftMarginThreshold: number;
  shortTextBonus: number;
  shortTextLength: number;
  conciseTextBonus: number;
  conciseTextLength: number;
  wellFormedBonus: number;
  incompletePenalty: number;
  /** Page-level acceptance floor (exclusive). */
  candidateThreshold: number;

  /** Whole-document acceptance floor (inclusive). */
  hierarchyThreshold: number;
  /** Word-overlap ratio above which two headings are duplicates. */
  duplicateOverlapRatio: number;
  recentHeadingWindow: number;
  pathTextLimit: number;
  maxOutlineItems: number;

  ocrResolution: number;
  ocrMinConfidence: number;
  ocrMaxConfidence: number;
  ocrSampleLength: number;

  /** Lines after a request-for-proposal line that continue the title. */
  titleContinuationKeywords: string[];
  /** Lines after a "to present a proposal" opener that continue the title. */
  titleOpenerKeywords: string[];
  titleDomainKeywords: string[];
  /** A business-plan line joins a scattered title only when it names one of these. */
  titleComponentKeywords: string[];
  titleMaxLength: number;

  fallbackPageSentences: number;
  fallbackNearbyPages: number;
  fallbackNearbyMinLength: number;
  fallbackNearbySentences: number;
  fallbackNearbyMaxLength: number;
  fallbackAnyPageMinLength: number;
  fallbackExcerptLength: number;
}

export const DEFAULT_CONFIG: HeuristicConfig = {
  spaceGapRatio: 0.25,

  headingSizeMaxAvgLength: 60,
  headingSizeKeywords: ["summary", "background", "appendix", "phase", "section"],

  minLineLength: 3,
  maxLineLength: 200,
  bandWeights: [0.4, 0.3, 0.2, 0.1],
  patternLevelCutoff: 0.3,
  boldBonus: 0.2,
  leftAlignedBonus: 0.1,
  leftMarginThreshold: 80,
  shortTextBonus: 0.1,
  shortTextLength: 100,
  conciseTextBonus: 0.1,
  conciseTextLength: 50,
  wellFormedBonus: 0.2,
  incompletePenalty: 0.3,
  candidateThreshold: 0.55,

  hierarchyThreshold: 0.6,
  duplicateOverlapRatio: 0.8,
  recentHeadingWindow: 3,
  pathTextLimit: 50,
  maxOutlineItems: 40,

  ocrResolution: 150,
  ocrMinConfidence: 30,
  ocrMaxConfidence: 0.8,
  ocrSampleLength: 200,

  titleContinuationKeywords: [
    "proposal",
    "developing",
    "business",
    "plan",
    "ontario",
    "digital",
    "library",
  ],
  titleOpenerKeywords: ["developing", "business", "plan", "ontario", "digital", "library"],
  titleDomainKeywords: ["ontario", "digital", "library"],
  titleComponentKeywords: ["ontario"],
  titleMaxLength: 150,

  fallbackPageSentences: 5,
  fallbackNearbyPages: 2,
  fallbackNearbyMinLength: 50,
  fallbackNearbySentences: 3,
  fallbackNearbyMaxLength: 500,
  fallbackAnyPageMinLength: 20,
  fallbackExcerptLength: 300,
};

const ratio = z.number().min(0).max(1);
const positive = z.number().finite().positive();
const count = z.number().int().nonnegative();

export const ConfigOverridesSchema = z
  .object({
    spaceGapRatio: positive,
    headingSizeMaxAvgLength: positive,
    headingSizeKeywords: z.array(z.string().min(1)),
    minLineLength: count,
    maxLineLength: count,
    bandWeights: z.tuple([ratio, ratio, ratio, ratio]),
    patternLevelCutoff: ratio,
    boldBonus: ratio,
    leftAlignedBonus: ratio,
    leftMarginThreshold: positive,
    shortTextBonus: ratio,
    shortTextLength: count,
    conciseTextBonus: ratio,
    conciseTextLength: count,
    wellFormedBonus: ratio,
    incompletePenalty: ratio,
    candidateThreshold: ratio,
    hierarchyThreshold: ratio,
    duplicateOverlapRatio: ratio,
    recentHeadingWindow: count,
    pathTextLimit: count,
    maxOutlineItems: count,
    ocrResolution: positive,
    ocrMinConfidence: z.number().min(0).max(100),
    ocrMaxConfidence: ratio,
    ocrSampleLength: count,
    titleContinuationKeywords: z.array(z.string().min(1)),
    titleOpenerKeywords: z.array(z.string().min(1)),
    titleDomainKeywords: z.array(z.string().min(1)),
    titleComponentKeywords: z.array(z.string().min(1)),
    titleMaxLength: count,
    fallbackPageSentences: count,
    fallbackNearbyPages: count,
    fallbackNearbyMinLength: count,
    fallbackNearbySentences: count,
    fallbackNearbyMaxLength: count,
    fallbackAnyPageMinLength: count,
    fallbackExcerptLength: count,
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

export function resolveConfig(overrides: ConfigOverrides = {}): HeuristicConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/** Parse a JSON config document; throws with the offending keys listed. */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  const parsed = ConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid config: ${issues}`);
  }
  return parsed.data;
}
