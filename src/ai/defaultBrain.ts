/**
 * Canned replies used when no brain service is configured, so a device can
 * be exercised end to end without a language model.
 */
export function defaultBrainReply(args: { transcript: string; language?: string }): string {
  const text = args.transcript.trim().toLowerCase();
  const indonesian = (args.language ?? '').toLowerCase().startsWith('id');

  if (text.includes('halo') || text.includes('hello') || text.includes('hai')) {
    return indonesian ? 'Halo juga! Mau main apa hari ini?' : 'Hello there! What shall we play today?';
  }

  if (text.includes('nama') || text.includes('name')) {
    return indonesian ? 'Aku boneka temanmu. Siapa namamu?' : "I'm your toy friend. What's your name?";
  }

  if (text.includes('cerita') || text.includes('story')) {
    return indonesian
      ? 'Dahulu kala ada seekor kelinci kecil yang suka melompat tinggi sekali.'
      : 'Once upon a time there was a little rabbit who loved to hop very high.';
  }

  return indonesian ? 'Wah, menarik! Ceritakan lagi dong.' : 'Ooh, interesting! Tell me more.';
}
