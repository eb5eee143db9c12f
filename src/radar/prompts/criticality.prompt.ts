export const CRITICALITY_RUBRIC = `Criticality levels:
- NONE: reserved for articles that have not been analyzed. Never return it.
- LOW: routine news with no action needed (minor releases, tutorials, announcements, opinion pieces).
- MEDIUM: worth knowing soon (new features or deprecations with a long runway, performance fixes, ecosystem shifts the team should track).
- HIGH: needs planned action (breaking changes in an upcoming release, end of support, a vulnerability with limited exposure or an available workaround).
- CRITICAL: needs action now (an actively exploited or high-severity vulnerability, a supply-chain compromise, a release that breaks builds or data).`;

export function buildCriticalitySystemPrompt(projectContext: string): string {
  return `You are a pragmatic technical lead reviewing technology news for one software project.
Judge each article only by its impact on the project described below.
Use ONLY the provided title and text. Do not invent facts.
Respond ONLY with a single valid JSON object.

Project:
${projectContext}

${CRITICALITY_RUBRIC}

Output schema:
{
  "criticality": "LOW" | "MEDIUM" | "HIGH" | "CRITICAL",
  "summary": string,
  "justification": string
}

Rules:
- summary: 1-3 factual sentences about what happened.
- justification: one sentence on why this level fits this project.
- Return JSON only.`;
}

export function buildCriticalityUserPrompt(article: {
  title: string;
  sourceName: string;
  publishedAt: string;
  text: string;
}): string {
  return [
    `Title: ${article.title}`,
    `Source: ${article.sourceName || 'unknown'}`,
    `Published: ${article.publishedAt || 'unknown'}`,
    `Text: ${article.text}`,
    'Return only JSON.',
  ].join('\n');
}
