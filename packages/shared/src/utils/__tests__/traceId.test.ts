import { generateTraceId, isValidTraceId, resolveTraceId } from '../traceId';

describe('TraceId utilities', () => {
  describe('generateTraceId', () => {
    it('should generate a valid UUID v4 format', () => {
      // Arrange & Act
      const traceId = generateTraceId();

      // Assert
      expect(traceId).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i
      );
    });

    it('should generate unique IDs', () => {
      // Arrange & Act
      const ids = new Set(Array.from({ length: 100 }, () => generateTraceId()));

      // Assert
      expect(ids.size).toBe(100);
    });
  });

  describe('isValidTraceId', () => {
    it('should accept UUIDs and opaque upstream ids', () => {
      // Arrange
      const validIds = ['550e8400-e29b-41d4-a716-446655440000', 'req_42.edge-1', 'a'];

      // Act & Assert
      validIds.forEach((id) => {
        expect(isValidTraceId(id)).toBe(true);
      });
    });

    it('should return false for invalid values', () => {
      // Arrange
      const invalidIds: unknown[] = ['', 'has space', 'line\nbreak', 'x'.repeat(129), null, 42];

      // Act & Assert
      invalidIds.forEach((id) => {
        expect(isValidTraceId(id)).toBe(false);
      });
    });
  });

  describe('resolveTraceId', () => {
    it('should keep a well-formed incoming id', () => {
      // Act & Assert
      expect(resolveTraceId('upstream-trace-1')).toBe('upstream-trace-1');
    });

    it('should generate a new id for missing or malformed input', () => {
      // Act
      const fromUndefined = resolveTraceId(undefined);
      const fromMalformed = resolveTraceId('bad id');

      // Assert
      expect(isValidTraceId(fromUndefined)).toBe(true);
      expect(fromMalformed).not.toBe('bad id');
      expect(fromMalformed).toHaveLength(36);
    });
  });
});
