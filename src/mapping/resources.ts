import fs from 'node:fs'
import path from 'node:path'
import appRoot from 'app-root-path'
import { MappingConfigError } from './errors'

const listCache = new Map<string, readonly string[]>()

// src/mapping or dist/mapping, two levels below the package root
const PACKAGE_ROOT = path.resolve(__dirname, '..', '..')

/** A word list shipped in this package's `data/` directory. */
export function packageDataPath(fileName: string) {
  return path.join(PACKAGE_ROOT, 'data', fileName)
}

/** User-supplied paths are relative to the application root. */
export function resolveFromRoot(filePath: string) {
  return path.resolve(appRoot.path, filePath)
}

/**
 * Read a JSON file holding an array of strings. Results are cached per
 * absolute path for the life of the process.
 */
export function readStringList(filePath: string): readonly string[] {
  const absPath = resolveFromRoot(filePath)
  const cached = listCache.get(absPath)
  if (cached) return cached

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(absPath, 'utf8'))
  } catch (err) {
    throw new MappingConfigError(`Cannot read word list ${absPath}`, { file: absPath }, { cause: err })
  }
  if (!Array.isArray(parsed) || !parsed.every((v): v is string => typeof v === 'string')) {
    throw new MappingConfigError(`${absPath} must contain a JSON array of strings`, { file: absPath })
  }

  const list = Object.freeze([...parsed])
  listCache.set(absPath, list)
  return list
}

export function readStopwords(filePath: string): ReadonlySet<string> {
  return new Set(readStringList(filePath).map((w) => w.toLowerCase()))
}
