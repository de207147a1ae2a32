import path from "node:path";
import { z } from "zod";
import { dataRootAbs, readJsonFile } from "./utils.js";

const NonEmptyText = z.string().trim().min(1);

export const ProductRecordSchema = z.object({
  name: NonEmptyText,
  concentration: NonEmptyText,
  skin_type: z.array(NonEmptyText),
  key_ingredients: z.array(NonEmptyText).min(1),
  benefits: z.array(NonEmptyText).min(1),
  how_to_use: NonEmptyText,
  side_effects: NonEmptyText,
  price: NonEmptyText
});

export type ProductRecord = z.infer<typeof ProductRecordSchema>;

export const DatasetSchema = z.object({
  products: z.array(ProductRecordSchema).min(1)
});

export type Dataset = z.infer<typeof DatasetSchema>;

export const DEFAULT_DATASET_FILENAME = "products.json";

export function defaultDatasetPath(): string {
  return path.join(dataRootAbs(), DEFAULT_DATASET_FILENAME);
}

export class DatasetError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(message);
    this.name = "DatasetError";
  }
}

export function parseDataset(raw: unknown, filePath = "<inline>"): Dataset {
  const parsed = DatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "$";
    throw new DatasetError(`Invalid dataset ${filePath}: ${where}: ${issue?.message ?? "invalid"}`, filePath);
  }
  return parsed.data;
}

export async function loadDataset(filePath: string = defaultDatasetPath()): Promise<Dataset> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DatasetError(`Unable to read dataset ${filePath}: ${msg}`, filePath);
  }
  return parseDataset(raw, filePath);
}

export type ProductSelection = number | "all";

export function parseSelection(input: string): ProductSelection {
  const trimmed = input.trim().toLowerCase();
  if (trimmed === "all") return "all";
  if (!/^\d+$/.test(trimmed)) throw new Error(`Product selection must be an index or "all" (got "${input}")`);
  return Number(trimmed);
}

export function selectProducts(dataset: Dataset, selection: ProductSelection): Array<{ index: number; product: ProductRecord }> {
  if (selection === "all") return dataset.products.map((product, index) => ({ index, product }));
  const product = dataset.products[selection];
  if (!Number.isInteger(selection) || selection < 0 || !product) {
    throw new Error(`Product index ${selection} is out of range (dataset has ${dataset.products.length} products)`);
  }
  return [{ index: selection, product }];
}
