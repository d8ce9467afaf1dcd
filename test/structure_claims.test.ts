import { describe, it, expect } from "vitest";

import {
  buildCitationList,
  generateMarkdown,
  parseClaimAnalysis,
  formatScore,
  spliceCitations,
  structureClaimsAnalysis,
} from "../src/claims/structure_claims";
import type { GroundingSupport } from "../src/contracts/content";
import { groundedResponse, textResponse } from "./helpers/scripted_model";

function support(startIndex: number | undefined, endIndex: number, indices: number[], scores: number[]): GroundingSupport {
  return {
    segment: startIndex === undefined ? { endIndex } : { startIndex, endIndex },
    groundingChunkIndices: indices,
    confidenceScores: scores,
  };
}

describe("spliceCitations", () => {
  it("appends a 1-based marker and a two-decimal score after the segment", () => {
    const text = "Paris is the capital of France.";
    expect(spliceCitations(text, [support(0, 31, [0], [0.87])])).toBe(
      "Paris is the capital of France.[1][0.87]"
    );
  });

  it("walks supports in start order whatever order they arrive in", () => {
    const text = "Alpha beta. Gamma delta.";
    const out = spliceCitations(text, [support(12, 24, [1], [0.5]), support(0, 11, [0], [0.75])]);
    expect(out).toBe("Alpha beta.[1][0.75] Gamma delta.[2][0.50]");
  });

  it("keeps input order for supports that start at the same offset", () => {
    const text = "Tea helps.";
    const first = support(0, 10, [0], [0.8]);
    const second = support(0, 10, [1], [0.6]);

    expect(spliceCitations(text, [first, second])).toBe("Tea helps.[1][0.80]Tea helps.[2][0.60]");
    expect(spliceCitations(text, [second, first])).toBe("Tea helps.[2][0.60]Tea helps.[1][0.80]");
  });

  it("rounds a score that sits exactly halfway to the even digit", () => {
    expect(spliceCitations("Tea.", [support(0, 4, [0], [0.625])])).toBe("Tea.[1][0.62]");
  });

  it("treats a missing start offset as zero", () => {
    expect(spliceCitations("Hello world", [support(undefined, 5, [0], [0.3])])).toBe(
      "Hello[1][0.30] world"
    );
  });

  it("joins several chunk indices and omits the score when there is none", () => {
    expect(spliceCitations("Tea has caffeine.", [support(0, 17, [0, 2], [])])).toBe(
      "Tea has caffeine.[1,3]"
    );
  });

  it("leaves the input untouched", () => {
    const supports = [support(12, 24, [1], [0.5]), support(0, 11, [0], [0.75])];
    spliceCitations("Alpha beta. Gamma delta.", supports);
    expect(supports.map((s) => s.segment.startIndex)).toEqual([12, 0]);
  });
});

describe("formatScore", () => {
  it("rounds halfway scores to even and everything else to nearest", () => {
    expect(formatScore(0.125)).toBe("0.12");
    expect(formatScore(0.875)).toBe("0.88");
    expect(formatScore(0.5)).toBe("0.50");
    expect(formatScore(0.876)).toBe("0.88");
    expect(formatScore(0.9)).toBe("0.90");
  });
});

describe("buildCitationList / generateMarkdown", () => {
  it("numbers chunks from one", () => {
    expect(
      buildCitationList([
        { web: { title: "Geo", uri: "https://x" } },
        { web: { title: "Atlas", uri: "https://y" } },
      ])
    ).toEqual(["1. [Geo](https://x)", "2. [Atlas](https://y)"]);
  });

  it("adds a citations section under the processed text", () => {
    expect(generateMarkdown("Body.", ["1. [Geo](https://x)"])).toBe(
      "Body.\n\n## Citations\n\n1. [Geo](https://x)"
    );
  });
});

describe("parseClaimAnalysis", () => {
  it("keeps the whole body as analysis when there are no alternatives", () => {
    expect(parseClaimAnalysis("Claim Analysis: Fine as stated.\n\n## Citations\n\n")).toEqual({
      claim_analysis: "Fine as stated.",
      alternatives: [],
      citations: [],
    });
  });

  it("skips alternatives that carry no explanation", () => {
    const parsed = parseClaimAnalysis(
      "Claim Analysis: Mixed.\nAlternatives:\n1. Only a rewording\n2. Better wording\nExplanation: Clearer."
    );
    expect(parsed.alternatives).toEqual([{ improved_claim: "Better wording", explanation: "Clearer." }]);
  });
});

describe("structureClaimsAnalysis", () => {
  it("structures the single-support example", () => {
    const response = groundedResponse(
      "Paris is the capital of France.",
      [support(0, 31, [0], [0.87])],
      [{ web: { title: "Geo", uri: "https://x" } }]
    );

    expect(structureClaimsAnalysis(response)).toEqual({
      claim_analysis: "Paris is the capital of France.[1][0.87]",
      alternatives: [],
      citations: [{ title: "Geo", uri: "https://x" }],
    });
  });

  it("splits analysis, alternatives and citations", () => {
    const text =
      "Claim Analysis: Coffee is safe in moderation.\n" +
      "Alternatives:\n" +
      "1. Moderate coffee intake is safe for most adults.\n" +
      "Explanation: Adds the population.\n" +
      "2. Up to four cups a day is safe.\n" +
      "Explanation: Quantifies moderation.";
    const response = groundedResponse(
      text,
      [support(16, 45, [0, 1], [0.91, 0.91])],
      [
        { web: { title: "Health Site", uri: "https://health.example/coffee" } },
        { web: { title: "Journal", uri: "https://journal.example/a" } },
      ]
    );

    expect(structureClaimsAnalysis(response)).toEqual({
      claim_analysis: "Coffee is safe in moderation.[1,2][0.91]",
      alternatives: [
        {
          improved_claim: "Moderate coffee intake is safe for most adults.",
          explanation: "Adds the population.",
        },
        {
          improved_claim: "Up to four cups a day is safe.",
          explanation: "Quantifies moderation.",
        },
      ],
      citations: [
        { title: "Health Site", uri: "https://health.example/coffee" },
        { title: "Journal", uri: "https://journal.example/a" },
      ],
    });
  });

  it("returns an empty object when the result has no grounding", () => {
    expect(structureClaimsAnalysis(textResponse("Plain answer."))).toEqual({});
    expect(structureClaimsAnalysis(groundedResponse("Plain answer.", [], []))).toEqual({});
    expect(structureClaimsAnalysis({ candidates: [] })).toEqual({});
  });

  it("gives the same structure for the same input", () => {
    const response = groundedResponse(
      "Paris is the capital of France.",
      [support(0, 31, [0], [0.87])],
      [{ web: { title: "Geo", uri: "https://x" } }]
    );
    expect(structureClaimsAnalysis(response)).toEqual(structureClaimsAnalysis(response));
  });
});
