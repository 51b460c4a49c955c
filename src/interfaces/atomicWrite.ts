import fsp from 'fs/promises'
import path from 'path'

/**
 * Write to a `.partial` sibling and rename over the target, so readers never
 * see a half-written file. Parent directories are created as needed.
 */
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`)
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}

export async function writeJson(filePath: string, value: unknown) {
  await atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n')
}
