export type ThresholdKey = "cpu" | "memory" | "disk" | "temperature";

export interface GreaterThanRule {
  type: "greater_than";
  /** Which configured limit applies. */
  threshold: ThresholdKey;
  displayName: string;
}

export interface BinaryOnRule {
  type: "binary_on";
  displayName: string;
}

export type ThresholdRule = GreaterThanRule | BinaryOnRule;

/** A rule resolved for one sensor, with its limit looked up. */
export type RuleMatch =
  | { type: "greater_than"; threshold: number | null; displayName: string }
  | { type: "binary_on"; threshold: null; displayName: string };
