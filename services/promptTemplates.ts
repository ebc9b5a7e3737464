export interface PromptContext {
  mpn: string;
  manufacturer?: string | null;
  catSubcat?: string | null;
}

export type TemplateKey = "generic" | "electrical" | "hvac" | "plumbing" | "refrigeration";

export interface PromptTemplate {
  key: TemplateKey;
  buildPrompt(context: PromptContext, attributes: readonly string[]): string;
}

interface TemplateVariant {
  subject: string;
  distributors: string;
  extraSources: string[];
  focusTitle?: string;
  focus: string[];
  searchTerms: string;
  verifyMaterial: boolean;
}

const VARIANTS: Record<TemplateKey, TemplateVariant> = {
  generic: {
    subject: "product",
    distributors: "major distributors and retailers",
    extraSources: [],
    focus: [],
    searchTerms: "specifications",
    verifyMaterial: false
  },
  electrical: {
    subject: "electrical part",
    distributors: "major electrical distributors (Grainger, Home Depot, Lowe's, Eaton, Schneider Electric)",
    extraSources: ["Check specialized electrical forums for professional insights"],
    focusTitle: "MATERIAL IDENTIFICATION REQUIREMENTS",
    focus: [
      "CRITICAL: Determine definitive material composition (plastic, metal, copper, aluminum, etc.)",
      'Find exact material specifications without using qualifiers like "likely" or "probably"',
      'Look for specific material descriptions: "made of", "constructed from", "material:", "composition:"',
      'Check material codes in specs: "AL" (aluminum), "Cu" (copper), "PVC", "ABS"',
      'If material cannot be definitively determined, use empty string "" for Material field'
    ],
    searchTerms: "specifications material",
    verifyMaterial: true
  },
  hvac: {
    subject: "HVAC component",
    distributors: "major HVAC distributors (Grainger, Ferguson, Johnstone Supply, Carrier, Trane)",
    extraSources: ["Check specialized HVAC forums and contractor resources"],
    focusTitle: "TECHNICAL SPECIFICATIONS FOCUS",
    focus: [
      "CRITICAL: Find exact capacity/BTU/tonnage ratings with proper units",
      "Determine precise electrical requirements (voltage, phase, amperage)",
      "Identify refrigerant type and compatibility (R-410A, R-32, etc.)",
      "Find exact physical dimensions and installation requirements",
      "Determine energy efficiency ratings (SEER, EER, HSPF) where applicable"
    ],
    searchTerms: "specifications technical data",
    verifyMaterial: false
  },
  plumbing: {
    subject: "plumbing component",
    distributors: "major plumbing distributors (Ferguson, Grainger, Home Depot, Lowe's, SupplyHouse)",
    extraSources: ["Check specialized plumbing forums and contractor resources"],
    focusTitle: "MATERIAL AND COMPATIBILITY FOCUS",
    focus: [
      "CRITICAL: Determine exact material composition (brass, copper, PVC, PEX, etc.)",
      "Find precise connection types and sizes (NPT, compression, sweat, etc.)",
      "Identify pressure and temperature ratings with proper units",
      "Determine compatibility with different plumbing systems",
      "Find certification information (NSF, ANSI, UPC, etc.)"
    ],
    searchTerms: "specifications material",
    verifyMaterial: true
  },
  refrigeration: {
    subject: "refrigeration component",
    distributors:
      "major refrigeration distributors (Grainger, Ferguson, Johnstone Supply, United Refrigeration)",
    extraSources: ["Check specialized refrigeration forums and contractor resources"],
    focusTitle: "TECHNICAL SPECIFICATIONS FOCUS",
    focus: [
      "CRITICAL: Find exact capacity ratings with proper units",
      "Determine precise electrical requirements (voltage, phase, amperage)",
      "Identify refrigerant type and compatibility (R-134a, R-404A, R-290, etc.)",
      "Find exact physical dimensions and installation requirements",
      "Determine temperature range and operating conditions"
    ],
    searchTerms: "specifications technical data",
    verifyMaterial: false
  }
};

// Category synonyms. "cooling" resolves to HVAC: the first matching family wins.
const SYNONYMS: Array<[TemplateKey, string[]]> = [
  ["electrical", ["electrical", "electric", "electronics"]],
  ["hvac", ["hvac", "heating", "cooling", "air conditioning"]],
  ["plumbing", ["plumbing", "pipe", "water"]],
  ["refrigeration", ["refrigeration", "refrigerant"]]
];

function numbered(lines: string[]): string {
  return lines.map((line, i) => `${i + 1}. ${line}`).join("\n");
}

function render(variant: TemplateVariant, context: PromptContext, attributes: readonly string[]): string {
  const manufacturer = context.manufacturer ?? "";
  const sources = [
    `Search manufacturer's official website first (${manufacturer}.com) for authoritative specifications`,
    `Search at least 5 ${variant.distributors}`,
    "Locate PDF technical datasheets and installation manuals for complete specifications",
    ...variant.extraSources,
    "Cross-reference information across all sources for accuracy"
  ];
  const focus = variant.focusTitle
    ? `\n${variant.focusTitle}:\n${numbered(variant.focus)}\n`
    : "";
  const verification = [
    "✓ Information comes from multiple independent sources",
    `✓ Data specifically references the exact MPN ${context.mpn}`,
    ...(variant.verifyMaterial ? ["✓ Material type is definitively identified"] : []),
    "✓ All technical specifications include proper units of measurement",
    "✓ No speculative information is included"
  ];

  return `
Extract comprehensive information about this ${variant.subject} by searching MULTIPLE SOURCES and websites:

PRODUCT MPN: ${context.mpn}
MANUFACTURER: ${manufacturer}
CATEGORY & SUBCATEGORY: ${context.catSubcat ?? ""}
ATTRIBUTES TO EXTRACT: ${attributes.join(", ")}

MULTI-SOURCE SEARCH STRATEGY:
${numbered(sources)}
${focus}
SEARCH EFFICIENCY GUIDELINES:
${numbered([
  `Use specific search strings: "[MPN] [manufacturer] ${variant.searchTerms}"`,
  'Search for datasheets using "[MPN] datasheet pdf technical specifications"',
  `Use industry-specific search terms for this ${variant.subject}`
])}

VERIFICATION REQUIREMENTS:
${verification.join("\n")}

RESPONSE FORMAT:
Return ONLY a single valid JSON object with these requirements:
1. Use double quotes for all keys and string values
2. No trailing commas
3. Ensure all special characters in strings are properly escaped
4. CRITICAL: For any unavailable information, use "" (empty string) without any explanatory text

CRITICAL REQUIREMENTS:
- Return ONLY the JSON object with no additional text before or after
- Never duplicate the JSON in the response
- NO NEWLINES at the beginning of your response
- For ANY attribute where information cannot be definitively determined, use "" (empty string)
- NEVER use phrases like "Information Not Available", "Unknown", or "Not Specified" - use "" instead
- Include complete specifications with proper units for available information
- If information conflicts between sources, use the most authoritative source
`;
}

function template(key: TemplateKey): PromptTemplate {
  return {
    key,
    buildPrompt: (context, attributes) => render(VARIANTS[key], context, attributes)
  };
}

const TEMPLATES: Record<TemplateKey, PromptTemplate> = {
  generic: template("generic"),
  electrical: template("electrical"),
  hvac: template("hvac"),
  plumbing: template("plumbing"),
  refrigeration: template("refrigeration")
};

export function resolveTemplateKey(category?: string | null): TemplateKey {
  const normalized = category?.trim().toLowerCase();
  if (!normalized) return "generic";
  const family = SYNONYMS.find(([, names]) => names.includes(normalized));
  return family ? family[0] : "generic";
}

export function resolveTemplate(category?: string | null): PromptTemplate {
  return TEMPLATES[resolveTemplateKey(category)];
}

/** Pulls the attribute list back out of a rendered prompt. */
export function parseAttributesFromPrompt(prompt: string): string[] {
  const line = /^ATTRIBUTES TO EXTRACT:(.*)$/m.exec(prompt);
  if (!line) return [];
  return line[1]
    .split(",")
    .map((attr) => attr.trim())
    .filter(Boolean);
}
