export * from './complete-coding.dto';
export * from './resolve-price-change.dto';
export * from './review-decision.dto';
