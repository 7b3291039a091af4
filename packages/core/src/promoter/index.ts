export { Promoter, buildPromotionMessage, PROMOTION_QUESTION } from './promoter';
export type { SyncMode, PromotionInput, PromotionResult, PromoterDependencies } from './promoter';
