/**
 * Stable notification ids derived from transport message ids.
 *
 * 32-bit FNV-1a over the UTF-16 code units, folded into the positive int range
 * the renderer accepts.
 */

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export const notificationIdFor = (messageId: string | undefined): number => {
  const source = messageId ?? '';
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < source.length; i++) {
    hash ^= source.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return (hash >>> 0) & 0x7fffffff;
};
