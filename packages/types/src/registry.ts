/**
 * Registry Types
 *
 * Top-level entities owned by no one: cards, clients, card groups,
 * bank colors and provisioned operators.
 */

import type { Instant } from "./financial.js";

export type CardStatus = "active" | "broken" | "hold";

export type ClientStatus = "active" | "blocked" | "hold";

/**
 * A payment card in the pool.
 * Identity is the (name, bank, cardNumber) triple.
 */
export interface Card {
  readonly id: number;
  readonly name: string;

  /** Bank name; grouping and coloring key. Empty when unknown. */
  readonly bank: string;

  /** Card number as entered (may be masked or spaced) */
  readonly cardNumber: string;

  readonly pin: string;
  readonly status: CardStatus;
  readonly groupId: number | null;
  readonly notes: string;
}

/**
 * A client on whose behalf payments are received. Name is unique.
 */
export interface Client {
  readonly id: number;
  readonly name: string;
  readonly status: ClientStatus;
  readonly notes: string;
}

export interface CardGroup {
  readonly id: number;
  readonly name: string;
}

/**
 * Display color assigned to a bank name (hex "#RRGGBB").
 */
export interface BankColor {
  readonly bank: string;
  readonly color: string;
}

export type OperatorRole = "admin" | "operator" | "viewer";

/**
 * An operator credential created by explicit provisioning.
 * Only the SHA-256 hash of the API key is kept.
 */
export interface Operator {
  readonly id: number;
  readonly name: string;
  readonly role: OperatorRole;
  readonly keyHash: string;
  readonly createdAt: Instant;
}
