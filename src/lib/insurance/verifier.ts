import { z } from "zod";

import { ValidationError } from "@/lib/errors";
import { insuranceDetailsSchema, type InsuranceDetails } from "@/lib/validations/insurance";

import carrierData from "./carriers.json";

// ── Carrier directory ──

const carrierSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).min(1),
});

export type Carrier = z.infer<typeof carrierSchema>;

export const ACCEPTED_CARRIERS: Carrier[] = z.array(carrierSchema).parse(carrierData);

const MEMBER_ID_PATTERN = /^[A-Z0-9]{4,20}$/;

/** Canonical carrier for a free-text name or alias, if accepted. */
export function findCarrier(
  name: string,
  carriers: Carrier[] = ACCEPTED_CARRIERS,
): Carrier | null {
  const needle = name.trim().toLowerCase();
  if (!needle) return null;
  return (
    carriers.find(
      (c) => c.name.toLowerCase() === needle || c.aliases.some((a) => a === needle),
    ) ?? null
  );
}

// ── Verifier ──

export interface VerificationResult {
  verified: boolean;
  carrier: string | null;
  reason?: string;
}

export interface InsuranceVerifier {
  verify(details: InsuranceDetails): Promise<VerificationResult>;
}

/**
 * Verifies coverage by lookup: the carrier must be in the accepted
 * directory and the member id must be alphanumeric.
 */
export class DirectoryInsuranceVerifier implements InsuranceVerifier {
  constructor(private readonly carriers: Carrier[] = ACCEPTED_CARRIERS) {}

  async verify(details: InsuranceDetails): Promise<VerificationResult> {
    const parsed = insuranceDetailsSchema.safeParse(details);
    if (!parsed.success) throw ValidationError.fromZod("insurance details", parsed.error);

    const carrier = findCarrier(parsed.data.carrier, this.carriers);
    if (!carrier) {
      return {
        verified: false,
        carrier: null,
        reason: `Carrier "${parsed.data.carrier}" is not accepted`,
      };
    }
    if (!MEMBER_ID_PATTERN.test(parsed.data.memberId)) {
      return { verified: false, carrier: carrier.name, reason: "Member ID format is invalid" };
    }
    return { verified: true, carrier: carrier.name };
  }
}
