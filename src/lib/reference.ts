import type { CareerLevel, Competency } from "./types.js";

export const COMPETENCIES: readonly Competency[] = Object.freeze([
  { key: "product_strategy", title: "Product Strategy" },
  { key: "craft_quality", title: "Craft Quality" },
  { key: "collaboration", title: "Collaboration" },
  { key: "impact", title: "Impact" },
  { key: "mentorship", title: "Mentorship" }
].map((c) => Object.freeze(c)));

// Ordered from Junior to Principal
const careerLevels: CareerLevel[] = [
  {
    level: "Junior",
    expectations: {
      craft_quality: "Executes with guidance",
      collaboration: "Communicates within team",
      impact: "Delivers assigned tasks"
    }
  },
  {
    level: "Mid",
    expectations: {
      product_strategy: "Contributes to product thinking",
      craft_quality: "Owns features end-to-end",
      collaboration: "Works cross-functionally",
      impact: "Improves team outcomes"
    }
  },
  {
    level: "Senior",
    expectations: {
      product_strategy: "Shapes problem spaces",
      craft_quality: "Raises quality bar",
      collaboration: "Aligns stakeholders",
      impact: "Leads complex initiatives",
      mentorship: "Coaches designers"
    }
  },
  {
    level: "Staff",
    expectations: {
      product_strategy: "Drives multi-team strategy",
      impact: "Org-level outcomes",
      mentorship: "Grows design org"
    }
  },
  {
    level: "Principal",
    expectations: {
      product_strategy: "Company-level strategy",
      impact: "Industry influence",
      mentorship: "Builds leaders"
    }
  }
];

export const CAREER_LEVELS: readonly CareerLevel[] = Object.freeze(careerLevels.map((l) => Object.freeze({ level: l.level, expectations: Object.freeze(l.expectations) })));

export interface ReferenceData {
  competencies: readonly Competency[];
  career_levels: readonly CareerLevel[];
}

export function referenceData(): ReferenceData {
  return { competencies: COMPETENCIES, career_levels: CAREER_LEVELS };
}
