export type SummaryMode = 'document' | 'transcript'

export const SUMMARIZE_SYSTEM_PROMPT = 'You are a precise technical summarizer.'

export const COMBINE_SYSTEM_PROMPT =
  'You are a precise technical summarizer that merges partial summaries into one coherent document.'

export const TAGS_SYSTEM_PROMPT =
  'You are a helpful assistant that labels documents with short topical tags.'

export function buildSummarizePrompt(text: string, mode: SummaryMode): string {
  if (mode === 'transcript') {
    return `Summarize the following transcript as a clean Markdown document.

Requirements:
- Begin with a clear title
- Organize the content into sections with headings
- Use bullet points where they help
- Focus on the key ideas and conclusions
- Do NOT mention timestamps or subtitles
- Do NOT mention that the text comes from a subtitle file

Transcript:
${text}`
  }

  return `Summarize the following document as a clean Markdown document.

Requirements:
- Begin with a clear title
- Organize the content into sections with headings
- Use bullet points where they help
- Focus on the key ideas and conclusions
- Keep important details and the overall structure
- Keep the document's main themes and topics

Document:
${text}`
}

export function buildCombinePrompt(first: string, second: string): string {
  return `Merge the two summaries below into one coherent Markdown document.

Requirements:
- Produce a single, well-structured document
- Begin with a clear title (reuse the better one or write a unified title)
- Organize the content into sections with headings
- Use bullet points where they help
- Remove duplicated information
- Keep the flow continuous from the first summary into the second
- Focus on the key ideas and conclusions
- Do NOT mention parts, halves, or that the text was combined

First summary:
${first}

Second summary:
${second}

Return only the merged Markdown document.`
}

export function buildTagsPrompt(summary: string): string {
  return `Read the summary below and produce exactly 5 tags describing its main topics.

Requirements:
- Exactly 5 tags
- 1 to 3 words each
- Lowercase only
- Separated by commas
- No generic words such as "summary", "discussion" or "document"
- Reply with the tags only: no numbering, no explanation

Summary:
${summary}

Reply format: tag1, tag2, tag3, tag4, tag5`
}
