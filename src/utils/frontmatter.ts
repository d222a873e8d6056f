const FRONTMATTER_DELIMITER = '---'
const FRONTMATTER_PATTERN = /^---\n(?:([\s\S]*?)\n)?---(?=\n|$)/

export type FrontmatterBlock = {
  /** Raw lines between the delimiters, untouched */
  lines: string[]
  /** Everything after the closing delimiter, including its newline */
  rest: string
}

export function readFrontmatterBlock(text: string): FrontmatterBlock | null {
  const match = text.match(FRONTMATTER_PATTERN)
  if (!match) {
    return null
  }
  const inner = match[1]
  return {
    lines: inner === undefined ? [] : inner.split('\n'),
    rest: text.slice(match[0].length),
  }
}

/**
 * Sets `key: value` in the leading frontmatter block. An existing key is
 * replaced on its own line (later duplicates are dropped), a missing key is
 * appended to the block, and text without a block gets a new one. All other
 * lines and the body are kept as they are.
 */
export function upsertFrontmatterField(
  text: string,
  key: string,
  value: string,
): string {
  const field = `${key}: ${value}`
  const block = readFrontmatterBlock(text)
  if (!block) {
    return `${FRONTMATTER_DELIMITER}\n${field}\n${FRONTMATTER_DELIMITER}\n\n${text}`
  }

  const lines: string[] = []
  let replaced = false
  for (const line of block.lines) {
    if (!isFieldLine(line, key)) {
      lines.push(line)
      continue
    }
    if (!replaced) {
      lines.push(field)
      replaced = true
    }
  }
  if (!replaced) {
    lines.push(field)
  }

  return `${FRONTMATTER_DELIMITER}\n${lines.join('\n')}\n${FRONTMATTER_DELIMITER}${block.rest}`
}

function isFieldLine(line: string, key: string): boolean {
  const separatorIndex = line.indexOf(':')
  if (separatorIndex === -1) {
    return false
  }
  return line.slice(0, separatorIndex).trim() === key
}
