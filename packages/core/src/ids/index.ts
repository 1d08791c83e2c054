export { secureRandomHex, secureId, shortId } from './secure-id.js';
