import { createInMemoryStores, InMemoryDatabase } from "../../db/client";
import { OutcomeStores } from "../../db/types";
import { Lead } from "../../types/outcomes";
import { createOutcomeServices, OutcomeServiceOptions } from "../index";

export const NOW = new Date("2026-03-02T12:00:00.000Z");
export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAgo(days: number): string {
  return new Date(NOW.getTime() - days * DAY_MS).toISOString();
}

export const LEAD_ID = "lead-1";

export function makeLead(overrides: Partial<Lead> = {}): Partial<Lead> & { id: string } {
  return {
    id: LEAD_ID,
    first_name: "Dana",
    last_name: "Reyes",
    email: "dana@example.com",
    company_name: "Acme Logistics",
    industry: "Logistics",
    ...overrides,
  };
}

/**
 * In-memory stores plus fully wired services with a fixed clock
 */
export function setup(
  options: OutcomeServiceOptions = {},
  patchStores: (stores: OutcomeStores) => OutcomeStores = (s) => s
) {
  const db = new InMemoryDatabase();
  const stores = patchStores(createInMemoryStores(db));
  const services = createOutcomeServices(stores, { now: () => NOW, ...options });
  return { db, stores, services };
}
