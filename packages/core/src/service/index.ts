export { ReviewService, createReviewService } from './review_service';
export type { ReviewServiceOverrides } from './review_service';
