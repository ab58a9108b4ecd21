// src/config/vocabularies.ts

import { z } from "zod";

import raw from "./vocabularies.json" with { type: "json" };

const TermList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

const VocabularySchema = z.object({
  crops: TermList,
  waterModels: TermList,
  climateModels: TermList,
  scenarios: TermList,
  variables: TermList,
  variableUnits: TermList,
  cropVariables: TermList,
});

export type VocabularyList = z.infer<typeof VocabularySchema>;

export type Vocabularies = {
  [K in keyof VocabularyList]: ReadonlySet<string>;
};

export function buildVocabularies(lists: VocabularyList): Vocabularies {
  const parsed = VocabularySchema.parse(lists);
  return {
    crops: new Set(parsed.crops),
    waterModels: new Set(parsed.waterModels),
    climateModels: new Set(parsed.climateModels),
    scenarios: new Set(parsed.scenarios),
    variables: new Set(parsed.variables),
    variableUnits: new Set(parsed.variableUnits),
    cropVariables: new Set(parsed.cropVariables),
  };
}

export const vocabularies: Vocabularies = buildVocabularies(raw);
