import type { ProductRecord } from "./dataset.js";
import { MIN_FAQS, MIN_QUESTIONS, QUESTION_CATEGORIES, type Question } from "./kinds.js";

export const SYSTEM_PROMPTS = {
  questions: "You are a customer research specialist. You anticipate what shoppers ask about a skincare product.",
  product: "You are a product copywriter. You write factual product pages strictly from the data provided.",
  competitor: "You are a product data specialist. You create realistic fictional competitor products for comparison.",
  comparison: "You are a product comparison expert. You analyze and compare skincare products objectively.",
  faq:
    "You are a skincare product expert and customer service specialist. " +
    "You answer customer questions accurately and concisely (2-4 sentences each) from the product data."
} as const;

export function productFacts(p: ProductRecord): string {
  return [
    `Name: ${p.name}`,
    `Concentration: ${p.concentration}`,
    `Skin Type: ${p.skin_type.join(", ")}`,
    `Ingredients: ${p.key_ingredients.join(", ")}`,
    `Benefits: ${p.benefits.join(", ")}`,
    `Usage: ${p.how_to_use}`,
    `Side Effects: ${p.side_effects}`,
    `Price: ${p.price}`
  ].join("\n");
}

export function questionsPrompt(p: ProductRecord): string {
  return `Generate at least ${MIN_QUESTIONS} distinct customer questions about this product.

Product Data:
${productFacts(p)}

Each question has a category, one of: ${QUESTION_CATEGORIES.join(", ")}. Cover every category.

Return JSON with this structure:
{
  "questions": [
    {"id": "q1", "text": "question text?", "category": "informational"}
  ]
}

Return ONLY valid JSON.`;
}

export function productPagePrompt(p: ProductRecord): string {
  return `Write the content sections of a product page.

Product Data:
${productFacts(p)}

Return JSON with this structure:
{
  "sections": {
    "overview": "2-3 sentence summary",
    "highlights": ["short selling points"],
    "ingredients": ["one line per key ingredient and what it does"],
    "usage": "how to use",
    "safety": "side effects and precautions",
    "pricing": "price and value statement"
  }
}

Use only the product data. Return ONLY valid JSON.`;
}

export function competitorPrompt(p: ProductRecord): string {
  return `Given this real product:
${productFacts(p)}

Create a fictional competitor product (Product B) with this exact JSON structure:
{
  "name": "fictional product name (similar category, different brand)",
  "concentration": "different concentration of a similar active ingredient",
  "skin_type": ["skin types"],
  "key_ingredients": ["3-4 ingredients, some overlapping, some unique"],
  "benefits": ["2-3 benefits"],
  "how_to_use": "usage instructions",
  "side_effects": "potential side effects",
  "price": "price in the same currency, 15-30% different"
}

Return ONLY valid JSON.`;
}

export function comparisonPrompt(a: ProductRecord, b: ProductRecord): string {
  return `Compare these two products.

Product A:
${productFacts(a)}

Product B:
${productFacts(b)}

Return JSON with this structure:
{
  "ingredient_comparison": {
    "common": ["shared ingredients"],
    "unique_to_a": ["ingredients only in A"],
    "unique_to_b": ["ingredients only in B"],
    "analysis": "2 sentence comparison of ingredient profiles"
  },
  "price_comparison": {
    "price_difference": "amount and percentage",
    "value_assessment": "which offers better value and why"
  },
  "effectiveness_comparison": {
    "concentration_analysis": "comparison of active ingredient concentrations",
    "benefit_overlap": ["shared benefits"],
    "unique_benefits_a": ["benefits unique to A"],
    "unique_benefits_b": ["benefits unique to B"]
  },
  "recommendation": "which product suits which skin type or concern"
}

Return ONLY valid JSON.`;
}

export function faqPrompt(p: ProductRecord, questions: readonly Question[]): string {
  const list = questions.map((q, i) => `${i + 1}. [${q.category}] ${q.text}`).join("\n");
  return `Answer every question below for this product. Produce at least ${MIN_FAQS} entries.

Product Data:
${productFacts(p)}

Questions to answer:
${list}

Return JSON with this structure:
{
  "faqs": [
    {"question": "exact question text", "answer": "helpful answer based on the product data"}
  ]
}

Return ONLY valid JSON.`;
}

export function repairPrompt(kind: string, previous: string): string {
  return (
    `Your previous response for "${kind}" did not contain a parsable JSON document.\n` +
    `Repair it so it is valid JSON.\n\n` +
    `Rules:\n` +
    `- Return ONLY JSON (no markdown fences)\n` +
    `- Do not add extra top-level keys\n` +
    `- Prefer minimal edits to preserve meaning\n\n` +
    `PREVIOUS OUTPUT:\n` +
    previous
  );
}
