/**
 * Model Pricing Types
 */

/**
 * Per-token USD rates for one model. Cache rates are optional; when absent
 * the matching token counts are not charged.
 */
export interface ModelPricing {
  inputCostPerToken: number;
  outputCostPerToken: number;
  cacheReadInputTokenCost?: number;
  cacheCreationInputTokenCost?: number;
}

/**
 * Read-only pricing lookup by exact model id
 */
export interface PricingMap {
  get(model: string): ModelPricing | undefined;
}
