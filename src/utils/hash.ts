import { createHash } from 'crypto'
import { stat } from 'fs/promises'

/**
 * Calculate SHA-256 hash of a string
 */
export function hashString(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Short SHA-256 prefix, used for fingerprints
 */
export function stableHash(content: string): string {
  return hashString(content).slice(0, 16)
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    return stats.isDirectory()
  } catch {
    return false
  }
}
