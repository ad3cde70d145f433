import type { CopywriterSummary } from "../core/summary.js";

export function placeholderContentRef(brandId: string, postPlanId: string): string {
  return `draft:${brandId}:${postPlanId}`;
}

/** Copywriter output used when no content generator is configured. */
export function fallbackContent(brandId: string, postPlanId: string): CopywriterSummary {
  return {
    kind: "copywriter",
    contentRef: placeholderContentRef(brandId, postPlanId),
    caption: "",
    hashtags: [],
    fallback: true
  };
}

const CARD_SIZE = 1024;
const LINE_CHARS = 40;
const LINE_HEIGHT = 40;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function wrapWords(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = line ? `${line} ${word}` : word;
    if (candidate.length <= maxChars || !line) {
      line = candidate;
    } else {
      lines.push(line);
      line = word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/** Deterministic 1024x1024 SVG card with the caption centred on it. */
export function renderPlaceholderSvg(caption: string): string {
  const lines = wrapWords(caption.trim(), LINE_CHARS);
  const blockTop = Math.round((CARD_SIZE - lines.length * LINE_HEIGHT) / 2);
  const body = lines
    .map(
      (line, i) =>
        `<text x="512" y="${blockTop + i * LINE_HEIGHT}" font-size="32" fill="#323232" text-anchor="middle">${escapeXml(line)}</text>`
    )
    .join("");
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CARD_SIZE}" height="${CARD_SIZE}" viewBox="0 0 ${CARD_SIZE} ${CARD_SIZE}">` +
    `<rect width="100%" height="100%" fill="#f5f5f5"/>` +
    `<text x="512" y="116" font-size="56" fill="#1e1e1e" text-anchor="middle">content-relay</text>` +
    body +
    `<text x="512" y="1000" font-size="14" fill="#787878" text-anchor="middle">placeholder image</text>` +
    `</svg>`
  );
}
