export { ContentEvaluator, analyzeKeywords, findHighlights, explainContent, PHISHING_KEYWORDS } from './content';
export { LinkEvaluator, collectUrls } from './link';
export { BehaviorEvaluator, describeBehavior } from './behavior';
export { HeaderEvaluator } from './header';
export { QrEvaluator, assessQrContent } from './qr';
export type { BehaviorEvaluatorOptions } from './behavior';
export type { QrEvaluatorOptions } from './qr';
