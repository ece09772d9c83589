/**
 * Allocation Engine Constants
 */

export const ENGINE_VERSION = 'v1.2';

export const DEFAULTS = {
  /** Reserve current capacity against a forecast shortfall next period */
  LOOKAHEAD: true,

  /** Segment used when neither the demand line nor the customer master names one */
  SEGMENT: 'Unknown',
} as const;
