export interface TimePort {
  now(): number;
  toIsoString(epochMs: number): string;
}
