import type { Fragment } from './fragment'

// Widest document index a request is measured for.
const FRAME_INDEX = 99_999

/**
 * One fragment in files-to-prompt CXML form. Indices are 1-based.
 */
export function renderDocument(fragment: Fragment, index: number): string {
  return [
    `<document index="${index}">`,
    `<source>${fragment.path}</source>`,
    '<document_content>',
    fragment.content,
    '</document_content>',
    '</document>',
  ].join('\n')
}

/**
 * Fragments wrapped in `<documents>`, numbered in the given order.
 */
export function renderDocuments(fragments: readonly Fragment[]): string {
  return ['<documents>', ...fragments.map((f, i) => renderDocument(f, i + 1)), '</documents>'].join('\n')
}

/**
 * Text a single document adds around its content and path, for overhead
 * estimates. Includes the newline that separates it from its neighbour.
 */
export function documentFrame(): string {
  return `${renderDocument({ path: '', content: '', byteLength: 0 }, FRAME_INDEX)}\n`
}
