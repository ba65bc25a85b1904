// api/src/facilityCatalog.ts
// Адаптер каталога: любые сырые формы диапазонов -> канонический Facility.
// Ошибки разбора живут здесь и не доходят до матчера.

import type { CatalogEntry, Facility } from "./types.js";

/** Битая запись каталога. Не фатальна: запись исключается, остальные обрабатываются. */
export class CatalogError extends Error {
  facilityName: string;
  rawRange: string;

  constructor(message: string, facilityName: string, rawRange: string) {
    super(message);
    this.name = "CatalogError";
    this.facilityName = facilityName;
    this.rawRange = rawRange;
  }
}

export type LoadedCatalog = {
  facilities: Facility[];
  rejected: CatalogError[];
};

// "<low>-<high>", границы могут быть отрицательными: "-10-5"
const RANGE_RE = /^\s*(-?\d+)\s*-\s*(-?\d+)\s*$/;

export const STATIC_FACILITY_CATALOG: readonly CatalogEntry[] = [
  { kind: "bounds", name: "Фитнес-центр", low: 20, high: 50 },
  { kind: "bounds", name: "Открытый стадион", low: 10, high: 40 },
  { kind: "bounds", name: "Тренажерный зал", low: 30, high: 60 },
  { kind: "bounds", name: "Стадион для соревновательной подготовки", low: 40, high: 70 },
];

function checkBounds(name: string, low: number, high: number, raw: string): Facility {
  if (!Number.isInteger(low) || !Number.isInteger(high)) {
    throw new CatalogError(`Non-integer cohort range "${raw}" for "${name}"`, name, raw);
  }
  if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high)) {
    throw new CatalogError(`Cohort range "${raw}" for "${name}" is out of range`, name, raw);
  }
  if (low > high) {
    throw new CatalogError(`Inverted cohort range "${raw}" for "${name}"`, name, raw);
  }
  return { name, lowInclusive: low, highExclusive: high };
}

export function parseCohortRange(text: string, facilityName = ""): { low: number; high: number } {
  const m = RANGE_RE.exec(text);
  if (!m) {
    throw new CatalogError(`Malformed cohort range "${text}" for "${facilityName}"`, facilityName, text);
  }
  const facility = checkBounds(facilityName, Number(m[1]), Number(m[2]), text);
  return { low: facility.lowInclusive, high: facility.highExclusive };
}

export function toFacility(entry: CatalogEntry): Facility {
  if (entry.kind === "text") {
    const { low, high } = parseCohortRange(entry.range, entry.name);
    return { name: entry.name, lowInclusive: low, highExclusive: high };
  }
  return checkBounds(entry.name, entry.low, entry.high, `${entry.low}-${entry.high}`);
}

export function loadCatalog(entries: readonly CatalogEntry[]): LoadedCatalog {
  const facilities: Facility[] = [];
  const rejected: CatalogError[] = [];

  for (const entry of entries) {
    try {
      facilities.push(toFacility(entry));
    } catch (err) {
      if (!(err instanceof CatalogError)) throw err;
      rejected.push(err);
    }
  }

  return { facilities, rejected };
}
