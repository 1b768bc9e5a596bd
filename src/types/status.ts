/** Half-open range of status codes, `[start, end)`. */
export type StatusRange = readonly [start: number, end: number];

/**
 * A named set of HTTP status codes, used by parsers to state which responses they accept.
 */
export class Status {
  readonly #ranges: readonly StatusRange[];
  /** Human readable description, e.g. `successful` */
  readonly description: string;

  /** Creates a status set from one or more half-open ranges */
  constructor(ranges: readonly StatusRange[], description: string) {
    this.#ranges = Object.freeze(ranges.map(([start, end]): StatusRange => [start, end]));
    this.description = description;
  }

  /** Status set holding a single code. */
  static code(code: number, description: string = String(code)): Status {
    return new Status([[code, code + 1]], description);
  }

  /** Status set holding every code in `[start, end)`. */
  static range(start: number, end: number, description = `${start}-${end - 1}`): Status {
    return new Status([[start, end]], description);
  }

  /** Ranges making up the set. */
  get ranges(): readonly StatusRange[] {
    return this.#ranges;
  }

  /** Whether `code` falls in any of the ranges. */
  contains(code: number): boolean {
    return this.#ranges.some(([start, end]) => code >= start && code < end);
  }

  /** Returns a set matching this set or `other`. */
  or(other: Status, description = `${this.description} or ${other.description}`): Status {
    return new Status([...this.#ranges, ...other.ranges], description);
  }

  toString(): string {
    return this.description;
  }
}

/** Predefined status sets. */
export const Statuses = {
  /** `200 OK` */
  ok: Status.code(200, 'OK'),
  /** `201 Created` */
  created: Status.code(201, 'Created'),
  /** `204 No Content` */
  noContent: Status.code(204, 'No Content'),
  /** `200-299` */
  successful: Status.range(200, 300, 'Successful'),
  /** `300-399` */
  redirection: Status.range(300, 400, 'Redirection'),
} as const;
