import { describe, it, expect } from 'vitest';
import { option } from 'pastel';
import { ZodBoolean, ZodDefault } from 'zod';

// Import the default command to test its exports
import * as indexCommand from '../../source/commands/index.js';

describe('Index Command', () => {
  describe('Command Exports', () => {
    it('should export description', () => {
      expect(typeof indexCommand.description).toBe('string');
      expect(indexCommand.description.length).toBeGreaterThan(0);
    });

    it('should export default component', () => {
      expect(typeof indexCommand.default).toBe('function');
      expect(indexCommand.default.name).toBe('Index');
    });
  });

  describe('Arguments Schema Validation', () => {
    it('should require exactly one dataset path', () => {
      expect(indexCommand.args.parse(['movies.txt'])).toEqual(['movies.txt']);
      expect(indexCommand.args.safeParse([]).success).toBe(false);
      expect(indexCommand.args.safeParse(['a.txt', 'b.txt']).success).toBe(false);
    });
  });

  describe('Options Schema Validation', () => {
    it('should default the path flag to false', () => {
      expect(indexCommand.options.parse({})).toEqual({ path: false });
    });

    it('should accept the path flag', () => {
      expect(indexCommand.options.parse({ path: true })).toEqual({ path: true });
    });

    it('should give -l as the short form of --path where Pastel reads it', () => {
      // Pastel unwraps the default before reading the alias from the description.
      const path = indexCommand.options.shape.path;
      expect(path).toBeInstanceOf(ZodDefault);

      const inner = path.removeDefault();
      expect(inner).toBeInstanceOf(ZodBoolean);
      expect(inner.description).toBe(
        option({ description: 'Also print the chain of movies linking each actor', alias: 'l' })
      );
    });

    it('should reject a non-boolean path flag', () => {
      expect(indexCommand.options.safeParse({ path: 'yes' }).success).toBe(false);
    });
  });
});
