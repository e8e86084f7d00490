export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

// One decoded line of a rollout file. `type` discriminates; most kinds carry a `payload` object.
export type LogRecord = JsonObject;

/**
 * A decoded line together with its source text. The text is what gets written
 * back, so numbers a double cannot hold survive a rewrite untouched.
 */
export type ParsedLine<T extends JsonValue = JsonValue> = {
  value: T;
  raw: string;
};

export type SessionIdentity = {
  cwd?: string;
  id?: string;
};

export type RepairStatus =
  | 'no-identity'
  | 'no-timestamp'
  | 'no-candidate'
  | 'no-matching-records'
  | 'repaired'
  | 'error';

export type RepairOutcome = {
  path: string;
  status: RepairStatus;
  backup?: string; // chosen .mixed.bak
  recovered?: number; // records taken from the backup
  lines?: number; // lines in the merged file
  written?: boolean;
  error?: string;
};

export type RepairOptions = {
  dryRun?: boolean;
};

export type BatchSummary = {
  scanned: number;
  repaired: number;
  outcomes: RepairOutcome[];
};
