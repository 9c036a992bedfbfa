// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Rounds a currency amount to whole cents. */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function addMoney(...values: number[]): number {
  return roundMoney(values.reduce((sum, value) => sum + value, 0));
}

/** Subtracts `b` from `a`, flooring the result at zero. */
export function subtractMoneyFloored(a: number, b: number): number {
  return Math.max(0, roundMoney(a - b));
}

/** Formats an amount for user-facing messages, e.g. "$12.50". */
export function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}
