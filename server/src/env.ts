/**
 * Load env before anything reads process.env (logger, sentry, config).
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'
import dotenv from 'dotenv'

// Repository root .env (shared with docker-compose); try cwd then __dirname so it works regardless of how the server is started
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv) {
  dotenv.config({ path: rootEnv, override: false })
}

// Inside Docker the data volume is mounted at /data; on the host keep jobs next to the server
const inDocker = fs.existsSync('/.dockerenv')
if (!process.env.DATA_DIR || process.env.DATA_DIR.trim().length === 0) {
  process.env.DATA_DIR = inDocker ? '/data' : path.join(process.cwd(), 'data')
}
