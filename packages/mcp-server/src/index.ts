#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadEngineConfig } from "@ip-valuation/engine";
import { DEFAULT_DATASET_PATH, createToolContext, loadDatasetFile } from "./context.js";
import { createServer } from "./server.js";

const config = loadEngineConfig(process.env);
const datasetPath = process.env.IPV_DATASET_PATH || DEFAULT_DATASET_PATH;
const dataset = await loadDatasetFile(datasetPath);

const server = createServer(createToolContext(dataset, config));
console.error(
  `ip-valuation-mcp: ${dataset.size} companies from ${datasetPath} ` +
    `(segment matching: ${config.segmentMatching}, portfolio mode: ${config.portfolioMode})`,
);

const transport = new StdioServerTransport();
await server.connect(transport);
