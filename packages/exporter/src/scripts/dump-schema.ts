#!/usr/bin/env node
/**
 * Schema dump — samples every collection in the application database and
 * writes the inferred field types as JSON. Handy when checking which
 * fields the usage rollups can rely on.
 *
 * Usage: npm run dump-schema -- [output.json] [sampleSize]
 */

import { writeFile } from "node:fs/promises";
import { loadConfig } from "../config.js";
import { openConnection } from "../db/index.js";
import { inferSchema, type FieldType } from "../schema/infer-schema.js";

const DEFAULT_OUTPUT = "mongo_schema.json";
const DEFAULT_SAMPLE_SIZE = 100;

async function main() {
  const [outFile = DEFAULT_OUTPUT, sampleArg] = process.argv.slice(2);
  const sampleSize = sampleArg === undefined ? DEFAULT_SAMPLE_SIZE : Number(sampleArg);
  if (!Number.isInteger(sampleSize) || sampleSize < 1) {
    throw new Error(`Invalid sample size: ${sampleArg}`);
  }

  const config = loadConfig();
  console.log(`🔎 Sampling ${config.mongo.dbName} (${sampleSize} documents per collection)...`);

  const conn = await openConnection(config.mongo);
  try {
    const db = conn.db;
    if (!db) throw new Error("Connection has no database handle");

    const collections = await db.listCollections({}, { nameOnly: true }).toArray();
    const names = collections.map((c) => c.name).sort();

    const schema: Record<string, FieldType> = {};
    for (const name of names) {
      const docs = await db.collection(name).find().limit(sampleSize).toArray();
      schema[name] = inferSchema(docs);
      console.log(`  ✓ ${name} (${docs.length} document(s))`);
    }

    await writeFile(outFile, JSON.stringify(schema, null, 4) + "\n");
    console.log(`🔎 Schema for ${names.length} collection(s) written to ${outFile}`);
  } finally {
    await conn.close();
  }
}

main().catch((err) => {
  console.error("Schema dump failed:", err);
  process.exit(1);
});
