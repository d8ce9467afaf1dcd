import { z } from "zod";

export const ClaimAlternative = z.object({
  improved_claim: z.string(),
  explanation: z.string(),
});

export type ClaimAlternative = z.infer<typeof ClaimAlternative>;

export const ClaimCitation = z.object({
  title: z.string(),
  uri: z.string(),
});

export type ClaimCitation = z.infer<typeof ClaimCitation>;

export type ClaimAnalysis = {
  claim_analysis: string;
  alternatives: ClaimAlternative[];
  citations: ClaimCitation[];
};

// Returned when the verification result carried no grounding; merges as a no-op.
export type EmptyClaimAnalysis = Record<string, never>;

export type StructuredClaimAnalysis = ClaimAnalysis | EmptyClaimAnalysis;

// Claim entries are model-authored; keep whatever extra fields the tool schema asked for.
export const IdentifiedClaim = z
  .object({
    claim: z.string().min(1),
  })
  .passthrough();

export type IdentifiedClaim = z.infer<typeof IdentifiedClaim>;

export const IdentifiedInstance = z.record(z.string(), z.unknown());

export type IdentifiedInstance = z.infer<typeof IdentifiedInstance>;

export const ProcessedClaim = IdentifiedClaim.extend({
  id: z.string().min(1),
  claim_analysis: z.string().optional(),
  alternatives: z.array(ClaimAlternative).optional(),
  citations: z.array(ClaimCitation).optional(),
});

export type ProcessedClaim = z.infer<typeof ProcessedClaim>;

export const ImpreciseLanguageInstance = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

export type ImpreciseLanguageInstance = z.infer<typeof ImpreciseLanguageInstance>;

export function isClaimAnalysis(value: StructuredClaimAnalysis): value is ClaimAnalysis {
  return typeof value.claim_analysis === "string";
}
