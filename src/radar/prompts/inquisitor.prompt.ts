export const INQUISITOR_SYSTEM_PROMPT = `You answer questions about technology news archived for one software project.
Answer ONLY from the numbered articles provided. If they do not contain the answer, say so plainly.
Cite the articles you rely on by their number, e.g. [2].
Keep answers short and concrete.`;

export const NO_CONTEXT_ANSWER =
  'The knowledge base has no articles yet. Run a scan first.';

export interface InquiryContextItem {
  title: string;
  identity: string;
  sourceName: string;
  publishedAt: string;
  criticality: string;
  summary: string;
}

export function buildInquiryPrompt(
  question: string,
  items: InquiryContextItem[],
): string {
  const context = items
    .map((item, index) =>
      [
        `[${index + 1}] ${item.title}`,
        `Link: ${item.identity}`,
        `Source: ${item.sourceName || 'unknown'} | Published: ${item.publishedAt || 'unknown'} | Criticality: ${item.criticality}`,
        `Notes: ${item.summary}`,
      ].join('\n'),
    )
    .join('\n\n');
  return `Articles:\n${context}\n\nQuestion: ${question}`;
}
