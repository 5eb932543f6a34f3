import { describe, it, expect } from 'vitest';
import { generateId, isValidSessionId } from '../../src/utils/id.js';

describe('id utilities', () => {
  describe('generateId', () => {
    it('should generate IDs with the correct format', () => {
      const id = generateId('etp');
      expect(id).toMatch(/^etp-[a-z0-9]+-[A-Za-z0-9_-]{12}$/);
    });

    it('should generate unique IDs on each call', () => {
      const ids = new Set<string>();
      for (let i = 0; i < 100; i++) {
        ids.add(generateId('test'));
      }
      expect(ids.size).toBe(100);
    });

    it('should reject empty prefix', () => {
      expect(() => generateId('')).toThrow('Prefix must be a non-empty string');
    });

    it('should reject prefix longer than 50 characters', () => {
      expect(() => generateId('a'.repeat(51))).toThrow('must be 50 characters or less');
    });

    it('should reject unsafe prefix characters', () => {
      expect(() => generateId('doc;drop')).toThrow('only alphanumeric characters and hyphens');
    });
  });

  describe('isValidSessionId', () => {
    it('should accept generated ids', () => {
      expect(isValidSessionId(generateId('etp'))).toBe(true);
    });

    it('should accept client-assigned ids', () => {
      expect(isValidSessionId('client_42:chat.1')).toBe(true);
    });

    it('should reject empty and spaced ids', () => {
      expect(isValidSessionId('')).toBe(false);
      expect(isValidSessionId('has space')).toBe(false);
    });

    it('should reject ids longer than 200 characters', () => {
      expect(isValidSessionId('x'.repeat(201))).toBe(false);
    });
  });
});
