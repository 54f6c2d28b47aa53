export { normalizeTurns, normalizeTurnType, normalizeLikelihood } from './normalize.js';
export { validateTurns } from './validate.js';
