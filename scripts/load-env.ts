/**
 * Environment loader for the worker and other scripts.
 *
 * Precedence: shell environment, then `.env.local`, then `.env`. dotenv never
 * overwrites a variable that is already set.
 *
 * Import this before anything that reads process.env at module scope:
 *   import "./load-env"
 */

import { config } from "dotenv"
import path from "node:path"

const root = process.cwd()

// quiet: a missing file is fine (containers inject env directly)
config({ path: path.resolve(root, ".env.local"), quiet: true })
config({ path: path.resolve(root, ".env"), quiet: true })
