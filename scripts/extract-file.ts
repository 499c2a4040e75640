/**
 * Ontology Extraction Script
 *
 * Runs extraction on one JSON file outside the MCP server.
 * Usage: npx tsx scripts/extract-file.ts <file.json> [database]
 *
 * Without a database name the proposals are printed and nothing is stored.
 * With one, the file is ingested into that database (created if missing).
 */

import dotenv from 'dotenv';
dotenv.config();

import { readFileSync, existsSync } from 'fs';
import { basename, resolve } from 'path';
import { createLLMProvider } from '../src/services/gemini/provider.js';
import {
  OntologyExtractor,
  buildProposals,
  ingestJsonDocument,
  parseJsonContent,
} from '../src/services/ontology/index.js';
import { DatabaseService } from '../src/services/storage/database/index.js';

const STORAGE_PATH = process.env.ONTOLOGY_STORAGE_PATH || undefined;

async function main(): Promise<void> {
  const [fileArg, databaseName] = process.argv.slice(2);
  if (!fileArg) {
    console.error('Usage: npx tsx scripts/extract-file.ts <file.json> [database]');
    process.exit(2);
  }

  const filePath = resolve(fileArg);
  if (!existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    process.exit(2);
  }

  const content = readFileSync(filePath, 'utf-8');
  const fileName = basename(filePath);
  const provider = createLLMProvider();
  console.error(`Provider: ${provider.status}${provider.status === 'unconfigured' ? ` (${provider.reason})` : ''}`);
  const extractor = new OntologyExtractor(provider);

  if (!databaseName) {
    const run = await extractor.extract(parseJsonContent(content, fileName), fileName);
    const batch = buildProposals(run.result);
    console.error(`Status: ${run.status}, proposals: ${batch.proposals.length}, skipped: ${batch.diagnostics.skipped.length}`);
    process.stdout.write(JSON.stringify(batch, null, 2) + '\n');
    return;
  }

  const db = DatabaseService.exists(databaseName, STORAGE_PATH)
    ? DatabaseService.open(databaseName, STORAGE_PATH)
    : DatabaseService.create(databaseName, undefined, STORAGE_PATH);
  try {
    const summary = await ingestJsonDocument(db, extractor, { fileName, content });
    process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
    console.error(`Stats: ${JSON.stringify(db.getStats())}`);
  } finally {
    db.close();
  }
}

main().catch((error: unknown) => {
  console.error('Extraction failed:', error);
  process.exit(1);
});
