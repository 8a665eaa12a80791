/**
 * Scope keys: instrument|workstation|technician, "*" for an unset part.
 */

import type { ScopeKey, ScopeParts } from "./types.js";

const SEPARATOR = "|";
const WILDCARD = "*";

function assertPart(name: string, value: string): void {
  if (value.includes(SEPARATOR)) {
    throw new Error(`${name} must not contain "${SEPARATOR}"`);
  }
}

export function makeScopeKey(parts: ScopeParts): ScopeKey {
  const instrumentId = parts.instrumentId.trim();
  if (!instrumentId || instrumentId === WILDCARD) {
    throw new Error("instrumentId is required");
  }
  assertPart("instrumentId", instrumentId);
  const workstationId = parts.workstationId?.trim() || WILDCARD;
  const technicianId = parts.technicianId?.trim() || WILDCARD;
  assertPart("workstationId", workstationId);
  assertPart("technicianId", technicianId);
  return [instrumentId, workstationId, technicianId].join(SEPARATOR);
}

export function parseScopeKey(key: ScopeKey): ScopeParts | null {
  const parts = key.split(SEPARATOR);
  if (parts.length !== 3) return null;
  const [instrumentId, workstationId, technicianId] = parts;
  if (!instrumentId || instrumentId === WILDCARD) return null;
  const result: ScopeParts = { instrumentId };
  if (workstationId && workstationId !== WILDCARD) result.workstationId = workstationId;
  if (technicianId && technicianId !== WILDCARD) result.technicianId = technicianId;
  return result;
}
