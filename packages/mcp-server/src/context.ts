import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import {
  DatasetProvider,
  ValuationEngine,
  parseDataset,
  type Dataset,
  type EngineConfig,
} from "@ip-valuation/engine";

export const DEFAULT_DATASET_PATH = fileURLToPath(new URL("../data/companies.json", import.meta.url));

export interface ToolContext {
  engine: ValuationEngine;
  provider: DatasetProvider;
  config: EngineConfig;
}

export async function loadDatasetFile(path: string): Promise<Dataset> {
  const raw = await readFile(path, "utf8");
  return parseDataset(JSON.parse(raw));
}

export function createToolContext(dataset: Dataset, config: EngineConfig): ToolContext {
  const provider = new DatasetProvider(dataset, config.segmentMatching);
  return { engine: new ValuationEngine(provider, config), provider, config };
}
