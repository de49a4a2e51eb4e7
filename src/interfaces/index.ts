export * from './quiz.interface';
export * from './generation.interface';
export * from './document.interface';
export * from './billing.interface';
export * from './usage.interface';
