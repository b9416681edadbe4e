/**
 * Optimistic concurrency for versioned records.
 *
 * A record's `version` starts at 1 and moves up by exactly one on every
 * successful update. An update is written only if the version it was
 * computed from is still the stored one; otherwise the caller gets a
 * conflict and has to re-read.
 *
 * @module marquee/data/versioned
 */

export interface VersionedRecord {
  id: number;
  version: number;
}

/**
 * Storage contract for versioned records.
 */
export interface VersionedStore<T extends VersionedRecord> {
  /** Current stored state, or null when absent */
  get(id: number): Promise<T | null>;

  /**
   * Write `candidate` if the stored version still equals `candidate.version`,
   * bumping it by one. Must be a single atomic compare-and-set.
   *
   * @returns The new version, or null when nothing matched
   */
  update(candidate: T): Promise<number | null>;
}

/**
 * Field name to first validation message.
 */
export type FieldErrors = Record<string, string>;

export interface UpdateRequest<T extends VersionedRecord> {
  /** Produce the changed record from the current one. Must not mutate it. */
  apply: (current: Readonly<T>) => T;

  /** Domain validation of the changed record; empty means valid */
  validate?: (candidate: T) => FieldErrors;

  /** Version the caller last saw, when it sent one */
  expectedVersion?: number;
}

export type UpdateOutcome<T> =
  | { kind: "updated"; value: T }
  | { kind: "not_found" }
  | { kind: "conflict" }
  | { kind: "invalid"; fields: FieldErrors };

/**
 * Read, change, validate and conditionally write a record.
 *
 * Store failures propagate as thrown errors.
 *
 * @example
 * ```typescript
 * const outcome = await updateVersioned(movies, 7, {
 *   apply: (m) => ({ ...m, title: "Alien" }),
 *   validate: validateMovie,
 * });
 * if (outcome.kind === "conflict") throw new ConflictError();
 * ```
 */
export async function updateVersioned<T extends VersionedRecord>(
  store: VersionedStore<T>,
  id: number,
  request: UpdateRequest<T>,
): Promise<UpdateOutcome<T>> {
  const current = await store.get(id);
  if (!current) {
    return { kind: "not_found" };
  }

  if (
    request.expectedVersion !== undefined &&
    request.expectedVersion !== current.version
  ) {
    return { kind: "conflict" };
  }

  // Identity and version stay those of the record that was read
  const candidate: T = {
    ...request.apply(current),
    id: current.id,
    version: current.version,
  };

  const fields = request.validate?.(candidate) ?? {};
  if (Object.keys(fields).length > 0) {
    return { kind: "invalid", fields };
  }

  const version = await store.update(candidate);
  if (version === null) {
    return { kind: "conflict" };
  }

  return { kind: "updated", value: { ...candidate, version } };
}
