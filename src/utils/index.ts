export { PatternMatcher } from './PatternMatcher';
export { SizeCalculator } from './SizeCalculator';
export { parseDuration, formatDuration, DAY_MS } from './Duration';
