export { normalizeContent } from './content-normalizer.js';
export { sanitizePlainText } from './plain-text-sanitizer.js';
