export { resolveSupersession, computeBounds, isClosingCandidate } from './resolver.js';
