import { z } from "zod";
import { compileKindSpec, type FieldSpec, type KindSpec } from "../core/validator.js";

export const MIN_QUESTIONS = 15;
export const MIN_FAQS = 15;

export const QUESTION_CATEGORIES = ["informational", "usage", "safety", "purchase", "comparison"] as const;
export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

const text: FieldSpec = { type: "string", nonEmpty: true };
const textList = (minItems?: number): FieldSpec => ({ type: "list", minItems, items: text });

const productFields: Record<string, FieldSpec> = {
  name: text,
  concentration: text,
  skin_type: textList(),
  key_ingredients: textList(1),
  benefits: textList(1),
  how_to_use: text,
  side_effects: text,
  price: text
};

export const PRODUCT_RECORD: KindSpec = { kind: "product_record", fields: productFields };

export const COMPETITOR_PRODUCT: KindSpec = { kind: "competitor_product", fields: productFields };

export const QUESTION_SET: KindSpec = {
  kind: "question_set",
  fields: {
    questions: {
      type: "list",
      minItems: MIN_QUESTIONS,
      items: {
        type: "mapping",
        fields: {
          id: text,
          text,
          category: { type: "string", oneOf: QUESTION_CATEGORIES }
        }
      }
    }
  }
};

export const PRODUCT_PAGE: KindSpec = {
  kind: "product_page",
  fields: {
    page_type: { type: "string", equals: "product" },
    product_name: text,
    sections: {
      type: "mapping",
      fields: {
        overview: text,
        highlights: textList(1),
        ingredients: textList(1),
        usage: text,
        safety: text,
        pricing: text
      }
    }
  }
};

const comparisonMetricFields: Record<string, FieldSpec> = {
  ingredient_comparison: {
    type: "mapping",
    fields: { common: textList(), unique_to_a: textList(), unique_to_b: textList(), analysis: text }
  },
  price_comparison: {
    type: "mapping",
    fields: { price_difference: text, value_assessment: text }
  },
  effectiveness_comparison: {
    type: "mapping",
    fields: {
      concentration_analysis: text,
      benefit_overlap: textList(),
      unique_benefits_a: textList(),
      unique_benefits_b: textList()
    }
  },
  recommendation: text
};

export const COMPARISON_PAGE: KindSpec = {
  kind: "comparison_page",
  fields: {
    page_type: { type: "string", equals: "comparison" },
    product_name: text,
    products: {
      type: "list",
      minItems: 2,
      maxItems: 2,
      items: { type: "mapping", fields: productFields }
    },
    metrics: { type: "mapping", fields: comparisonMetricFields }
  }
};

export const FAQ_PAGE: KindSpec = {
  kind: "faq_page",
  fields: {
    page_type: { type: "string", equals: "faq" },
    product_name: text,
    faqs: {
      type: "list",
      minItems: MIN_FAQS,
      items: { type: "mapping", fields: { question: text, answer: text } }
    }
  }
};

export const KINDS = {
  product_record: compileKindSpec(PRODUCT_RECORD),
  competitor_product: compileKindSpec(COMPETITOR_PRODUCT),
  question_set: compileKindSpec(QUESTION_SET),
  product_page: compileKindSpec(PRODUCT_PAGE),
  comparison_page: compileKindSpec(COMPARISON_PAGE),
  faq_page: compileKindSpec(FAQ_PAGE)
};

export type KindName = keyof typeof KINDS;

// Typed views the units use to read dependency outputs that already passed validation.
export const QuestionSchema = z.object({
  id: z.string(),
  text: z.string(),
  category: z.enum(QUESTION_CATEGORIES)
});

export type Question = z.infer<typeof QuestionSchema>;

export const QuestionSetSchema = z.object({ questions: z.array(QuestionSchema) });
