/** One matched monitoring event. Nested objects are reachable through dotted paths. */
export type Match = Readonly<Record<string, unknown>>;

/** Alert text fields that accept positional template arguments. */
export type TemplateField = 'description' | 'title' | 'type' | 'source';

/** Substitution order applied by the assembler. */
export const TEMPLATE_FIELDS: readonly TemplateField[] = ['description', 'title', 'type', 'source'];

/** One piece of evidence attached to an alert. */
export interface Artifact {
  dataType: string;
  data: string;
  /** Traffic-light protocol level, 0 (white) to 3 (red). */
  tlp: number;
  tags: string[];
  message: string | null;
}

/** Resolved custom field; the value sits under its declared type key (`{ order: 0, string: 'x' }`). */
export interface CustomField {
  order: number;
  [type: string]: unknown;
}

/** Body posted to `/api/alert`. */
export interface HiveAlertPayload {
  title: string;
  description: string;
  /** Epoch milliseconds. */
  date: number;
  sourceRef: string;
  tags: string[];
  artifacts: Artifact[];
  customFields: Record<string, CustomField>;
  type?: string;
  source?: string;
  severity?: number;
  tlp?: number;
  pap?: number;
  status?: string;
  follow?: boolean;
  caseTemplate?: string;
  externalLink?: string;
  [key: string]: unknown;
}

/** Operator-facing description of a configured alerter. */
export interface HiveAlerterInfo {
  type: 'hivealerter';
  host: string;
}

/** Transport used to hand a finished payload to the remote API. */
export interface AlertDelivery {
  deliver(payload: HiveAlertPayload): Promise<void>;
}

/** Alert channel contract. */
export interface Alerter {
  alert(matches: readonly Match[]): Promise<void>;
  describe(): HiveAlerterInfo;
}
