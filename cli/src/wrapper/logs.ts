import fs from 'fs-extra'
import * as path from 'path'
import { timestamp } from '../installers/utils.js'

/** `{purpose}-{ide}-{timestamp}.log`; timestamps sort lexically. */
export function logFileName(purpose: string, ideId: string, date: Date = new Date()): string {
  return `${purpose}-${ideId}-${timestamp(date)}.log`
}

export async function listLogs(dir: string, purpose: string, ideId?: string): Promise<string[]> {
  const prefix = ideId ? `${purpose}-${ideId}-` : `${purpose}-`
  let names: string[]
  try {
    names = await fs.readdir(dir)
  } catch {
    return []
  }
  return names
    .filter((n) => n.startsWith(prefix) && n.endsWith('.log'))
    .sort()
    .reverse()
    .map((n) => path.join(dir, n))
}

/** Delete all but the `keep` newest logs for one purpose and IDE. */
export async function pruneLogs(dir: string, purpose: string, ideId: string, keep: number): Promise<string[]> {
  const stale = (await listLogs(dir, purpose, ideId)).slice(keep)
  for (const file of stale) await fs.remove(file)
  return stale
}
