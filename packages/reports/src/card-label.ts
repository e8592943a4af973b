/**
 * @cardflow/reports: Human-readable card labels.
 */

import type { Card } from "@cardflow/types";

/**
 * Last four characters of a card number, ignoring spaces when at least
 * four digits remain. Empty when the number is too short.
 */
export function cardLast4(cardNumber: string): string {
  const compact = cardNumber.replace(/ /g, "");
  if (compact.length >= 4) {
    return compact.slice(-4);
  }
  return cardNumber.length >= 4 ? cardNumber.slice(-4) : "";
}

/**
 * "Bank Name *1234". Any missing part is dropped.
 *
 * @example
 * cardLabel({ name: "Visa", bank: "Alfa", cardNumber: "4276 1600 1234 5678" })
 * // "Alfa Visa *5678"
 */
export function cardLabel(card: Pick<Card, "name" | "bank" | "cardNumber">): string {
  const last4 = cardLast4(card.cardNumber);
  let label = last4 !== "" ? `${card.name} *${last4}` : card.name;
  const bank = card.bank.trim();
  if (bank !== "") {
    label = `${bank} ${label}`;
  }
  return label.trim();
}
