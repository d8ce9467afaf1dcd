import type {
  ClaimAlternative,
  ClaimAnalysis,
  ClaimCitation,
  StructuredClaimAnalysis,
} from "../contracts/claims";
import type {
  GenerateContentResponse,
  GroundingChunk,
  GroundingSupport,
} from "../contracts/content";
import { isTextPart } from "../contracts/content";

const CITATIONS_HEADING = "## Citations";
const ALTERNATIVES_MARKER = /\nAlternatives:/;
const ANALYSIS_LABEL = "Claim Analysis:";
const EXPLANATION_LABEL = "Explanation:";
const NUMBERED_ITEM = /\n\d+\./;
const CITATION_LINE = /\d+\.\s+\[(.*?)\]\((.*?)\)/g;
const CITATIONS_SECTION = /## Citations[\s\S]*/;

// Two decimals; a score exactly halfway between (an odd multiple of 1/8) rounds to even.
export function formatScore(score: number): string {
  const eighths = score * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(score * 100);
    return ((lower % 2 === 0 ? lower : lower + 1) / 100).toFixed(2);
  }
  return score.toFixed(2);
}

function citationMarker(support: GroundingSupport): string {
  const indices = support.groundingChunkIndices.map((index) => index + 1).join(",");
  // Scores within one support are identical; the first stands for all.
  const score = support.confidenceScores[0];
  return score === undefined ? `[${indices}]` : `[${indices}][${formatScore(score)}]`;
}

/**
 * Splice `[i,j][score]` markers after each grounded segment.
 * Supports are walked in start order; ties keep their original order.
 */
export function spliceCitations(text: string, supports: readonly GroundingSupport[]): string {
  const ordered = [...supports].sort(
    (a, b) => (a.segment.startIndex ?? 0) - (b.segment.startIndex ?? 0)
  );

  let processed = "";
  let lastEnd = 0;
  for (const support of ordered) {
    const start = support.segment.startIndex ?? 0;
    const end = support.segment.endIndex;
    processed += text.slice(lastEnd, start);
    processed += text.slice(start, end);
    processed += citationMarker(support);
    lastEnd = end;
  }

  return processed + text.slice(lastEnd);
}

export function buildCitationList(chunks: readonly GroundingChunk[]): string[] {
  return chunks.map((chunk, i) => `${i + 1}. [${chunk.web?.title ?? ""}](${chunk.web?.uri ?? ""})`);
}

export function generateMarkdown(processedText: string, citations: readonly string[]): string {
  return `${processedText}\n\n${CITATIONS_HEADING}\n\n${citations.join("\n")}`;
}

function parseAlternatives(section: string): ClaimAlternative[] {
  const alternatives: ClaimAlternative[] = [];
  for (const item of section.split(NUMBERED_ITEM)) {
    if (!item.trim()) continue;
    const at = item.indexOf(EXPLANATION_LABEL);
    if (at < 0) continue;
    alternatives.push({
      improved_claim: item.slice(0, at).trim(),
      explanation: item.slice(at + EXPLANATION_LABEL.length).trim(),
    });
  }
  return alternatives;
}

function parseCitations(markdown: string): ClaimCitation[] {
  return Array.from(markdown.matchAll(CITATION_LINE), (match) => ({
    title: match[1],
    uri: match[2],
  }));
}

export function parseClaimAnalysis(markdown: string): ClaimAnalysis {
  const marker = ALTERNATIVES_MARKER.exec(markdown);
  const head = marker ? markdown.slice(0, marker.index) : markdown;
  const tail = marker ? markdown.slice(marker.index + marker[0].length) : "";

  const claimAnalysis = head
    .replaceAll(ANALYSIS_LABEL, "")
    .trim()
    .replace(CITATIONS_SECTION, "")
    .trim();

  return {
    claim_analysis: claimAnalysis,
    alternatives: parseAlternatives(tail.replace(CITATIONS_SECTION, "")),
    citations: parseCitations(markdown),
  };
}

/**
 * Turn a grounded verification result into `{claim_analysis, alternatives, citations}`.
 * Returns `{}` when the result carries no grounding supports. Pure: no I/O, no mutation.
 */
export function structureClaimsAnalysis(response: GenerateContentResponse): StructuredClaimAnalysis {
  const candidate = response.candidates[0];
  const supports = candidate?.groundingMetadata?.groundingSupports ?? [];
  if (!candidate || supports.length === 0) {
    return {};
  }

  const text = candidate.content.parts.filter(isTextPart).map((part) => part.text).join("");
  const chunks = candidate.groundingMetadata?.groundingChunks ?? [];

  const processed = spliceCitations(text, supports);
  return parseClaimAnalysis(generateMarkdown(processed, buildCitationList(chunks)));
}
