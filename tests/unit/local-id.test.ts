import { describe, expect, it } from 'vitest';
import {
  GENERATED_CHAT_ID_PATTERN,
  GENERATED_NOTE_ID_PATTERN,
  generateChatId,
  generateLocalId,
  generateNoteId,
} from '../../core/src/utils/local-id.js';

// 1700000042 seconds after the epoch
const NOW = new Date(1700000042000);

describe('local ids', () => {
  it('should prefix note ids with the last two digits of the unix time', () => {
    expect(generateNoteId(NOW, () => 0)).toBe('42aaa');
  });

  it('should prefix chat ids with the last six digits of the unix time', () => {
    expect(generateChatId(NOW, () => 35)).toBe('000042999999');
  });

  it('should pad short timestamps with zeros', () => {
    expect(generateLocalId(4, 1, new Date(5000), () => 1)).toBe('0005b');
  });

  it('should match the published id patterns', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateNoteId()).toMatch(GENERATED_NOTE_ID_PATTERN);
      expect(generateChatId()).toMatch(GENERATED_CHAT_ID_PATTERN);
    }
  });
});
