export { inferLanguage, toCodeChange, buildReviewInput } from './review_input';
