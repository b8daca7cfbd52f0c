export type FieldType = 'text' | 'date' | 'currency' | 'composite';

export type NormalizerId = 'text' | 'date' | 'currency';

export interface PatternRule {
  source: string;
  flags: string;
  priority: number;
  /** Capture group holding the value; 0 is the whole match */
  group: number;
  normalizer: NormalizerId;
  /** Position among the field's rules by descending priority, 0 = best */
  rank: number;
  /** Compiled with `g` and `d`; only ever used through matchAll */
  matcher: RegExp;
}

export interface FieldDefinition {
  key: string;
  label: string;
  type: FieldType;
  description: string;
  /** Sorted by descending priority */
  rules: readonly PatternRule[];
}

export interface Template {
  id: string;
  description: string;
  fields: readonly FieldDefinition[];
}

export interface FieldRef {
  key: string;
  label: string;
  type: FieldType;
}
