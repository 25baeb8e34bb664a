import type { IFileSystem } from '../interfaces/filesystem.js'
import { RESPONSE_BODIES, STATUS_TEXT } from '../http/types.js'
import type { Logger } from '../logging/logger.js'
import { basicLogger } from '../logging/logger.js'
import { decodeStrict } from '../utils/buffer.js'

export type FileLookup =
  | { found: true; status: 200; statusText: string; body: string; filePath: string }
  | { found: false; status: 404; statusText: string; body: string }

export interface FileResolverOptions {
  root: string
  fs: IFileSystem
  confineToRoot: boolean
  quiet?: boolean
  logger?: Logger
}

/** `/` is served as `/index.html`; every other path is left alone. */
export function normalizeRequestPath(path: string): string {
  return path === '/' ? '/index.html' : path
}

/** Plain concatenation: no `..` handling, no symlink checks. */
export function resolveTarget(root: string, path: string): string {
  return root.replace(/\/+$/, '') + path
}

/**
 * Lexically collapse `.`, `..` and repeated slashes. Leading `..` segments
 * of a relative path are kept.
 */
export function normalizePath(path: string): string {
  const absolute = path.startsWith('/')
  const resolved: string[] = []
  for (const seg of path.split('/')) {
    if (seg === '' || seg === '.') continue
    if (seg === '..') {
      if (resolved.length > 0 && resolved[resolved.length - 1] !== '..') {
        resolved.pop()
      } else if (!absolute) {
        resolved.push('..')
      }
      continue
    }
    resolved.push(seg)
  }

  const joined = resolved.join('/')
  if (absolute) return '/' + joined
  return joined === '' ? '.' : joined
}

export function isWithinRoot(root: string, target: string): boolean {
  const base = normalizePath(root)
  const candidate = normalizePath(target)
  if (base === '.') {
    return !candidate.startsWith('/') && candidate !== '..' && !candidate.startsWith('../')
  }
  if (base === '/') {
    return candidate.startsWith('/')
  }
  return candidate === base || candidate.startsWith(base + '/')
}

export class FileResolver {
  private root: string
  private fs: IFileSystem
  private confineToRoot: boolean
  private quiet: boolean
  private logger: Logger

  constructor(options: FileResolverOptions) {
    this.root = options.root
    this.fs = options.fs
    this.confineToRoot = options.confineToRoot
    this.quiet = options.quiet ?? false
    this.logger = options.logger ?? basicLogger()
  }

  /**
   * Read the file behind a request path. Every failure, whatever its cause,
   * becomes the same 404; the cause is only logged.
   */
  async resolve(requestPath: string): Promise<FileLookup> {
    const filePath = resolveTarget(this.root, normalizeRequestPath(requestPath))
    if (!this.quiet) {
      this.logger.info(`Attempting to serve file: ${filePath}`)
    }

    if (this.confineToRoot && !isWithinRoot(this.root, filePath)) {
      this.logger.warn(`Refusing ${filePath}: outside document root ${this.root}`)
      return notFound()
    }

    try {
      const data = await this.fs.readFile(filePath)
      return {
        found: true,
        status: 200,
        statusText: STATUS_TEXT[200],
        body: decodeStrict(data),
        filePath,
      }
    } catch (err) {
      this.logger.warn(`Could not read ${filePath}:`, err instanceof Error ? err.message : err)
      return notFound()
    }
  }
}

function notFound(): FileLookup {
  return {
    found: false,
    status: 404,
    statusText: STATUS_TEXT[404],
    body: RESPONSE_BODIES.notFound,
  }
}
