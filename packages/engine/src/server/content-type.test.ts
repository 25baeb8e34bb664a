import { describe, expect, it } from 'vitest'
import {
  classifyBody,
  extensionOf,
  getContentType,
  HTML_CONTENT_TYPE,
  TEXT_CONTENT_TYPE,
} from './content-type.js'

describe('classifyBody', () => {
  it('detects a doctype after leading whitespace', () => {
    expect(classifyBody('  \n<!DOCTYPE html><html></html>')).toBe(HTML_CONTENT_TYPE)
  })

  it('detects an opening html tag', () => {
    expect(classifyBody('<html lang="en">')).toBe(HTML_CONTENT_TYPE)
  })

  it('is case-sensitive', () => {
    expect(classifyBody('<!doctype html>')).toBe(TEXT_CONTENT_TYPE)
    expect(classifyBody('<HTML>')).toBe(TEXT_CONTENT_TYPE)
  })

  it('treats everything else as plain text', () => {
    expect(classifyBody('hello world')).toBe(TEXT_CONTENT_TYPE)
    expect(classifyBody('')).toBe(TEXT_CONTENT_TYPE)
  })
})

describe('getContentType', () => {
  it('prefers the file extension over the body', () => {
    expect(getContentType('public/notes.txt', '<!DOCTYPE html>')).toBe(TEXT_CONTENT_TYPE)
    expect(getContentType('public/page.HTML', 'plain words')).toBe(HTML_CONTENT_TYPE)
    expect(getContentType('public/old.htm', 'x')).toBe(HTML_CONTENT_TYPE)
  })

  it('sniffs the body for unknown extensions', () => {
    expect(getContentType('public/data.json', '<html>')).toBe(HTML_CONTENT_TYPE)
    expect(getContentType('public/README', 'read me')).toBe(TEXT_CONTENT_TYPE)
  })

  it('sniffs the body when there is no file', () => {
    expect(getContentType(undefined, 'The requested file was not found')).toBe(TEXT_CONTENT_TYPE)
  })
})

describe('extensionOf', () => {
  it('only looks at the last path segment', () => {
    expect(extensionOf('public.d/readme')).toBe('')
    expect(extensionOf('public/archive.tar.gz')).toBe('.gz')
  })

  it('does not treat dotfiles as extensions', () => {
    expect(extensionOf('public/.hidden')).toBe('')
  })
})
