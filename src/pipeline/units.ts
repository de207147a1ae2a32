import { ParseError } from "../core/errors.js";
import type { GenerateOptions } from "../core/generator_client.js";
import { extractPayload, isJsonObject, type JsonValue } from "../core/response_parser.js";
import { defineUnit, type Unit, type UnitContext } from "../core/unit.js";
import { validateOutput } from "../core/validator.js";
import type { UnitName } from "../run_manager.js";
import { ProductRecordSchema, type ProductRecord } from "./dataset.js";
import { KINDS, QuestionSetSchema, type KindName } from "./kinds.js";
import {
  SYSTEM_PROMPTS,
  comparisonPrompt,
  competitorPrompt,
  faqPrompt,
  productPagePrompt,
  questionsPrompt,
  repairPrompt
} from "./prompts.js";

/** The slice of GeneratorClient the units call. */
export type TextGenerator = {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
};

export type ContentUnitDeps = {
  generator: TextGenerator;
  /** Re-asks allowed when a response holds no parsable payload. */
  repairAttempts?: number;
};

export const ARTIFACT_FOR_UNIT: Record<UnitName, string> = {
  parser: "parsed_product.json",
  questions: "questions.json",
  product: "product_page.json",
  comparison: "comparison_page.json",
  faq: "faq.json"
};

type PageType = "product" | "comparison" | "faq";

/**
 * Page header first, then the generated body. The header always comes from the
 * record, whatever the body claims. A non-mapping body is left for the
 * validator to reject.
 */
function composePage(pageType: PageType, productName: string, body: JsonValue): JsonValue {
  if (!isJsonObject(body)) return body;
  const { page_type: _pageType, product_name: _productName, ...rest } = body;
  return { page_type: pageType, product_name: productName, ...rest };
}

function productInput(ctx: UnitContext): ProductRecord {
  return ProductRecordSchema.parse(ctx.inputs.parser);
}

export function createContentUnits(deps: ContentUnitDeps): Unit[] {
  const repairAttempts = Math.max(0, Math.floor(deps.repairAttempts ?? 1));

  async function generatePayload(
    ctx: UnitContext,
    args: { kind: KindName; system: string; prompt: string }
  ): Promise<JsonValue> {
    const options: GenerateOptions = {
      system: args.system,
      shapeHint: { kind: args.kind },
      signal: ctx.signal,
      log: ctx.log
    };
    let text = await deps.generator.generate(args.prompt, options);

    for (let repair = 0; ; repair++) {
      try {
        return extractPayload(text);
      } catch (err) {
        if (!(err instanceof ParseError) || repair >= repairAttempts) throw err;
        ctx.log(`No JSON payload in ${args.kind} response. Asking for a repair (${repair + 1}/${repairAttempts})...`);
        text = await deps.generator.generate(repairPrompt(args.kind, err.rawText), options);
      }
    }
  }

  const parser = defineUnit("parser", [], async (ctx) => {
    validateOutput(ctx.record, KINDS.product_record);
    const normalized: ProductRecord = ProductRecordSchema.parse(ctx.record);
    return validateOutput(normalized, KINDS.product_record).value;
  });

  const questions = defineUnit("questions", ["parser"], async (ctx) => {
    const product = productInput(ctx);
    const payload = await generatePayload(ctx, {
      kind: "question_set",
      system: SYSTEM_PROMPTS.questions,
      prompt: questionsPrompt(product)
    });
    return validateOutput(payload, KINDS.question_set).value;
  });

  const product = defineUnit("product", ["parser"], async (ctx) => {
    const record = productInput(ctx);
    const body = await generatePayload(ctx, {
      kind: "product_page",
      system: SYSTEM_PROMPTS.product,
      prompt: productPagePrompt(record)
    });
    return validateOutput(composePage("product", record.name, body), KINDS.product_page).value;
  });

  const comparison = defineUnit("comparison", ["parser"], async (ctx) => {
    const a = productInput(ctx);
    const competitorPayload = await generatePayload(ctx, {
      kind: "competitor_product",
      system: SYSTEM_PROMPTS.competitor,
      prompt: competitorPrompt(a)
    });
    const competitor = validateOutput(competitorPayload, KINDS.competitor_product).value;
    const b = ProductRecordSchema.parse(competitor);
    ctx.log(`Competitor for comparison: ${b.name}`);

    const metrics = await generatePayload(ctx, {
      kind: "comparison_page",
      system: SYSTEM_PROMPTS.comparison,
      prompt: comparisonPrompt(a, b)
    });
    const page: JsonValue = {
      page_type: "comparison",
      product_name: a.name,
      products: [a, competitor],
      metrics
    };
    return validateOutput(page, KINDS.comparison_page).value;
  });

  const faq = defineUnit("faq", ["parser", "questions"], async (ctx) => {
    const record = productInput(ctx);
    const { questions: asked } = QuestionSetSchema.parse(ctx.inputs.questions);
    const body = await generatePayload(ctx, {
      kind: "faq_page",
      system: SYSTEM_PROMPTS.faq,
      prompt: faqPrompt(record, asked)
    });
    return validateOutput(composePage("faq", record.name, body), KINDS.faq_page).value;
  });

  return [parser, questions, product, comparison, faq];
}
