// src/lib/fill/fieldExamples.ts
import type { PlaceholderKind } from "@/lib/fill/types";

const EXAMPLES: Record<PlaceholderKind | "company", [string, string]> = {
  text: ["State of Delaware", "Software development services"],
  "party-name": ["Jane Doe", "TechStart Inc."],
  company: ["Innovation Labs LLC", "Global Systems Corp"],
  date: ["January 15, 2025", "12/31/2025"],
  amount: ["$50,000.00", "1200"],
  address: ["123 Main Street, New York, NY 10001", "456 Business Park, Suite 200, San Francisco, CA 94105"],
  duration: ["12 months", "3 years"],
  other: ["Yes", "Option A"],
};

/** Two short example answers for a field, picked by kind and label. */
export function examplesFor(kind: PlaceholderKind, label: string): [string, string] {
  const l = label.toLowerCase();
  if (kind === "party-name" && /company|corporation|business|employer|vendor/.test(l)) {
    return EXAMPLES.company;
  }
  return EXAMPLES[kind];
}
