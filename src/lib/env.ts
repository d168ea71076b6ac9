/**
 * Quran Stream Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parseEnv (envSchema.ts) → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";

import { parseEnv } from "./envSchema.js";

// .env is read from the working directory. Run the bot from the project root.
// Tests set their env vars before import, so they must win over the file.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

const result = parseEnv(process.env);
if (!result.ok) {
  console.error(`Environment validation failed:\n${result.issues.join("\n")}`);
  process.exit(1);
}

export const env = result.env;
