export interface CampaignContext {
  readonly brandName: string;
  readonly industry: string;
  readonly productInfo: string;
  readonly targetAudience: string;
  readonly trends?: ReadonlyArray<string>;
}

/**
 * Freezes a caller-supplied context so it stays unchanged for the whole iteration.
 */
export function freezeContext(context: CampaignContext): CampaignContext {
  return Object.freeze({
    brandName: context.brandName,
    industry: context.industry,
    productInfo: context.productInfo,
    targetAudience: context.targetAudience,
    ...(context.trends !== undefined && { trends: Object.freeze([...context.trends]) })
  });
}
