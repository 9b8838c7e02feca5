/**
 * @file cipher/index.ts
 * @brief Combiner and counter-mode cipher exports
 */

export { encryptSymbol, decryptSymbol } from './combiner';
export { LwrStreamCipher } from './stream-cipher';
