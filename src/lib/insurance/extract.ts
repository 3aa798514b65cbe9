import type { PartialInsurance } from "@/lib/validations/insurance";

import { ACCEPTED_CARRIERS, type Carrier } from "./verifier";

const MEMBER_ID_PATTERNS = [
  /member\s*id[:\s]+is\s+([a-z0-9]+)/,
  /member\s*id[:\s]+([a-z0-9]+)/,
  /member\s*number[:\s]+is\s+([a-z0-9]+)/,
  /member\s*number[:\s]+([a-z0-9]+)/,
  /\bid[:\s]+([a-z0-9]{6,})/,
];

const GROUP_PATTERNS = [
  /group\s*number[:\s]+is\s+([a-z0-9]+)/,
  /group\s*number[:\s]+([a-z0-9]+)/,
  /group[:\s]+([a-z0-9]+)/,
];

function firstMatch(patterns: RegExp[], text: string): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[1].toUpperCase();
  }
  return undefined;
}

/**
 * Keyword extraction of carrier, member id and group number from a
 * patient's free-text reply. Fields that cannot be found are left out.
 */
export function extractInsuranceDetails(
  text: string,
  carriers: Carrier[] = ACCEPTED_CARRIERS,
): PartialInsurance {
  const lower = text.toLowerCase();
  const details: PartialInsurance = {};

  const carrier = carriers.find((c) => c.aliases.some((alias) => lower.includes(alias)));
  if (carrier) details.carrier = carrier.name;

  const memberId = firstMatch(MEMBER_ID_PATTERNS, lower);
  if (memberId) details.memberId = memberId;

  const groupNumber = firstMatch(GROUP_PATTERNS, lower);
  if (groupNumber) details.groupNumber = groupNumber;

  return details;
}
