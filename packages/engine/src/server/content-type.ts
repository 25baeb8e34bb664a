export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8'
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8'

const CONTENT_TYPES: Record<string, string> = {
  '.html': HTML_CONTENT_TYPE,
  '.htm': HTML_CONTENT_TYPE,
  '.txt': TEXT_CONTENT_TYPE,
}

/**
 * Guess the content type from the body alone. Case-sensitive: only
 * `<!DOCTYPE html>` and `<html` count as HTML.
 */
export function classifyBody(body: string): string {
  const trimmed = body.trimStart()
  if (trimmed.startsWith('<!DOCTYPE html>') || trimmed.startsWith('<html')) {
    return HTML_CONTENT_TYPE
  }
  return TEXT_CONTENT_TYPE
}

export function extensionOf(filePath: string): string {
  const name = filePath.substring(filePath.lastIndexOf('/') + 1)
  const dot = name.lastIndexOf('.')
  return dot <= 0 ? '' : name.substring(dot).toLowerCase()
}

/**
 * Content type by file extension, falling back to body sniffing when
 * there is no file or the extension is not in the table.
 */
export function getContentType(filePath: string | undefined, body: string): string {
  if (filePath) {
    const byExtension = CONTENT_TYPES[extensionOf(filePath)]
    if (byExtension) return byExtension
  }
  return classifyBody(body)
}
