/**
 * Load .env.local then .env before config.ts reads process.env.
 * Import this first in every script.
 */
import * as dotenv from "dotenv";

dotenv.config({ path: ".env.local" });
dotenv.config();
