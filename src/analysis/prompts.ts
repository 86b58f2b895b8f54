/**
 * Prompt construction for bill analysis.
 */

import type { ExpenseCategory } from "../types/claim-contract.js";
import type { AnalysisContext } from "./bill-analyzer.js";

export const SYSTEM_INSTRUCTION =
  "You are an expert expense auditor reviewing bills attached to employee expense claims. " +
  "You answer with a single JSON object and nothing else.";

/** What a genuine bill of each category is expected to show */
const CATEGORY_CHECKS: Readonly<Record<ExpenseCategory, readonly string[]>> = {
  travel: [
    "Ticket or receipt shows the travel mode, route (from and to) and travel date",
    "Travel mode on the bill matches the claimed mode and is allowed for the grade",
    "Passenger name is present on tickets",
  ],
  food: [
    "Restaurant or vendor name and address are printed",
    "Bill is itemised with a total",
    "GST number is present for registered vendors",
  ],
  accommodation: [
    "Hotel name, address and GST number are printed",
    "Check-in and check-out dates and the number of nights are shown",
    "Guest name matches a single occupant stay",
  ],
  medical: [
    "Pharmacy, clinic or hospital name is printed",
    "Doctor name or registration number, or a prescription reference, is visible",
    "Medicines or services are itemised",
  ],
  communication: [
    "Service provider and account or phone number are shown",
    "Billing period is printed",
    "Amount due matches the claimed amount",
  ],
  other: [
    "Vendor name and the purpose of the purchase are clear",
    "Bill has a number, a date and a total",
  ],
};

function formatDayFirst(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

export function buildAnalysisPrompt(context: AnalysisContext, today: Date): string {
  const isoToday = today.toISOString().slice(0, 10);
  const rules: Record<string, unknown> = {
    max_amount: context.ceiling,
  };
  if (context.category === "travel") {
    rules["allowed_travel_modes"] = context.allowedTravelModes;
  }
  const checks = CATEGORY_CHECKS[context.category]
    .map((check, i) => `${i + 1}. ${check}`)
    .join("\n");

  return `Analyze the attached bill for an expense reimbursement claim.

**Date format:**
- Bills usually print dates day first: DD/MM/YY or DD/MM/YYYY
- 11/01/26 means 11 January 2026, not November 1
- Today is ${formatDayFirst(today)} (${isoToday})
- Return bill_date as YYYY-MM-DD
- Only flag a future date if it is in the future after day-first parsing

**Claim:**
- Category: ${context.category}
- Claimed amount: ${context.currency} ${context.amount}
- Expense date: ${context.expenseDate}
- Description: ${context.description}
- Employee grade: ${context.grade}${context.travelMode ? `\n- Claimed travel mode: ${context.travelMode}` : ""}

**Rules for grade ${context.grade}, ${context.category}:**
${JSON.stringify(rules, null, 2)}

**Category checks:**
${checks}

**General checks:**
- Amount on the bill matches the claimed amount
- Bill shows no sign of tampering or editing
- Bill date is consistent with the expense date

Return ONLY valid JSON with this structure:
{
  "is_authentic": true/false,
  "confidence_score": 0-100,
  "bill_number": "string or null",
  "bill_date": "YYYY-MM-DD or null",
  "vendor_name": "string or null",
  "extracted_amount": number or null,
  "has_gst": true/false/null,
  "gst_number": "string or null",
  "has_required_stamps": true/false/null,
  "travel_mode": "bus/train/cab/flight_economy/flight_business/own_vehicle or null",
  "travel_route": "from-to or null",
  "payment_method": "cash/card/upi or null",
  "red_flags": ["suspicious elements"],
  "missing_elements": ["required elements not present"],
  "recommendation": "APPROVE/REJECT/REVIEW",
  "recommendation_reason": "string",
  "summary": "one or two lines"
}`;
}
