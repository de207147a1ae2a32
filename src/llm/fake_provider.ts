import { MIN_FAQS, MIN_QUESTIONS, QUESTION_CATEGORIES } from "../pipeline/kinds.js";
import type { GenerationRequest, TextGenerationProvider } from "./provider.js";

export type FakeProviderOptions = {
  /** Entries in a generated question set. */
  questionCount?: number;
  /** Entries in a generated FAQ page. */
  faqCount?: number;
  /** Simulated latency per call. */
  delayMs?: number;
};

const QUESTION_STEMS: Record<(typeof QUESTION_CATEGORIES)[number], string[]> = {
  informational: ["What is {name}?", "What does {name} contain?", "Who makes {name}?"],
  usage: ["How do I apply {name}?", "When should I use {name}?", "Can I layer {name} with other products?"],
  safety: ["Is {name} safe for sensitive skin?", "What side effects can {name} cause?", "Can I use {name} during pregnancy?"],
  purchase: ["How much does {name} cost?", "How long does one bottle of {name} last?", "Where can I buy {name}?"],
  comparison: ["How does {name} compare to similar serums?", "Is {name} better than cheaper alternatives?", "Why choose {name}?"]
};

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Cancelled"));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Cancelled"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function factValues(prompt: string, label: string): string[] {
  const re = new RegExp(`^${label}: (.*)$`, "gm");
  return [...prompt.matchAll(re)].map((m) => (m[1] ?? "").trim());
}

function listed(prompt: string): Array<{ category: string; text: string }> {
  return [...prompt.matchAll(/^\d+\. \[([a-z]+)\] (.+)$/gm)].map((m) => ({ category: m[1] ?? "", text: m[2] ?? "" }));
}

function fenced(kind: string, value: unknown): string {
  return `Here is the ${kind} you asked for.\n\n\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\`\n\nLet me know if you need changes.`;
}

/**
 * Offline provider: deterministic, prose-wrapped JSON for every artifact kind
 * the content units request. Same request, same text.
 */
export class FakeProvider implements TextGenerationProvider {
  readonly name = "fake";
  readonly calls: GenerationRequest[] = [];
  private readonly questionCount: number;
  private readonly faqCount: number;
  private readonly delayMs: number;

  constructor(options: FakeProviderOptions = {}) {
    this.questionCount = options.questionCount ?? MIN_QUESTIONS;
    this.faqCount = options.faqCount ?? MIN_FAQS;
    this.delayMs = options.delayMs ?? 0;
  }

  async generate(request: GenerationRequest, options: { signal: AbortSignal }): Promise<string> {
    this.calls.push(request);
    await wait(this.delayMs, options.signal);

    const kind = request.shapeHint?.kind;
    const names = factValues(request.prompt, "Name");
    const name = names[0] ?? "the product";

    switch (kind) {
      case "question_set":
        return fenced(kind, { questions: this.questions(name) });
      case "product_page":
        return fenced(kind, { sections: this.productSections(request.prompt, name) });
      case "competitor_product":
        return fenced(kind, this.competitor(request.prompt, name));
      case "comparison_page":
        return fenced(kind, this.metrics(request.prompt, name, names[1] ?? "the competitor"));
      case "faq_page":
        return fenced(kind, { faqs: this.faqs(request.prompt, name) });
      default:
        return `No structured output for "${kind ?? "unknown"}".`;
    }
  }

  private questions(name: string): Array<{ id: string; text: string; category: string }> {
    const out: Array<{ id: string; text: string; category: string }> = [];
    for (let i = 0; i < this.questionCount; i++) {
      const category = QUESTION_CATEGORIES[i % QUESTION_CATEGORIES.length];
      const stems = QUESTION_STEMS[category];
      const stem = stems[Math.floor(i / QUESTION_CATEGORIES.length) % stems.length];
      out.push({ id: `q${i + 1}`, text: stem.replace("{name}", name), category });
    }
    return out;
  }

  private productSections(prompt: string, name: string) {
    const ingredients = (factValues(prompt, "Ingredients")[0] ?? "").split(", ").filter(Boolean);
    const benefits = (factValues(prompt, "Benefits")[0] ?? "").split(", ").filter(Boolean);
    return {
      overview: `${name} delivers ${factValues(prompt, "Concentration")[0] ?? "a focused formula"} for everyday care.`,
      highlights: benefits.length > 0 ? benefits : ["Daily care"],
      ingredients: ingredients.length > 0 ? ingredients.map((i) => `${i}: supports the formula`) : ["See packaging"],
      usage: factValues(prompt, "Usage")[0] ?? "Follow the label.",
      safety: factValues(prompt, "Side Effects")[0] ?? "Patch test before first use.",
      pricing: `Priced at ${factValues(prompt, "Price")[0] ?? "retail"}.`
    };
  }

  private competitor(prompt: string, name: string) {
    return {
      name: `Rival of ${name}`,
      concentration: "15% Vitamin C",
      skin_type: ["Normal", "Dry"],
      key_ingredients: ["Vitamin C", "Vitamin E", "Ferulic Acid"],
      benefits: ["Brightening", "Antioxidant protection"],
      how_to_use: "Apply 3-4 drops in the evening",
      side_effects: "May cause mild irritation",
      price: factValues(prompt, "Price")[0] ?? "n/a"
    };
  }

  private metrics(prompt: string, a: string, b: string) {
    const [ingredientsA = "", ingredientsB = ""] = factValues(prompt, "Ingredients");
    const setA = ingredientsA.split(", ").filter(Boolean);
    const setB = ingredientsB.split(", ").filter(Boolean);
    const [benefitsA = "", benefitsB = ""] = factValues(prompt, "Benefits");
    const benA = benefitsA.split(", ").filter(Boolean);
    const benB = benefitsB.split(", ").filter(Boolean);
    return {
      ingredient_comparison: {
        common: setA.filter((i) => setB.includes(i)),
        unique_to_a: setA.filter((i) => !setB.includes(i)),
        unique_to_b: setB.filter((i) => !setA.includes(i)),
        analysis: `${a} and ${b} share a core active. Their supporting ingredients differ.`
      },
      price_comparison: {
        price_difference: "Comparable price range",
        value_assessment: `${a} offers the better value for its concentration.`
      },
      effectiveness_comparison: {
        concentration_analysis: `${a} uses a gentler concentration than ${b}.`,
        benefit_overlap: benA.filter((x) => benB.includes(x)),
        unique_benefits_a: benA.filter((x) => !benB.includes(x)),
        unique_benefits_b: benB.filter((x) => !benA.includes(x))
      },
      recommendation: `Choose ${a} for oily skin and ${b} for dry skin.`
    };
  }

  private faqs(prompt: string, name: string): Array<{ question: string; answer: string }> {
    const asked = listed(prompt);
    const out: Array<{ question: string; answer: string }> = [];
    for (let i = 0; i < this.faqCount; i++) {
      const q = asked[i % Math.max(1, asked.length)];
      const question = q ? q.text : `Question ${i + 1} about ${name}?`;
      const suffix = i >= asked.length && asked.length > 0 ? ` (${i + 1})` : "";
      out.push({ question: `${question}${suffix}`, answer: `${name}: answer ${i + 1} based on the product data.` });
    }
    return out;
  }
}
