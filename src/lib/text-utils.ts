/**
 * Text helpers for article input and report rendering.
 *
 * @module text-utils
 */

export interface ArticleSections {
  title: string;
  introduction: string;
  body: string;
  conclusion: string;
}

/**
 * Truncate text to at most `maxLength` characters, ending with "..." when cut.
 */
export function truncateText(text: string, maxLength: number = 100): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return text.slice(0, maxLength - 3) + "...";
}

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.split("\n").map((line) => line.trim()).filter(Boolean).join("\n"))
    .filter((p) => p.length > 0);
}

/**
 * Split an article into rough sections.
 *
 * The first non-empty line is the title; the first paragraph after it is the
 * introduction and the last one the conclusion. `body` is always the full text.
 */
export function extractArticleSections(articleText: string): ArticleSections {
  const sections: ArticleSections = {
    title: "",
    introduction: "",
    body: articleText,
    conclusion: "",
  };

  const paragraphs = splitParagraphs(articleText);
  if (paragraphs.length === 0) return sections;

  const [first, ...rest] = paragraphs;
  const firstLines = first.split("\n");
  sections.title = firstLines[0];

  // A title sharing its paragraph with text keeps that text as the introduction
  const remaining = firstLines.length > 1 ? [firstLines.slice(1).join("\n"), ...rest] : rest;
  if (remaining.length > 0) {
    sections.introduction = remaining[0];
    sections.conclusion = remaining[remaining.length - 1];
  }

  return sections;
}
