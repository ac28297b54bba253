import {
  evaluateRange,
  findMissingKeys,
  parseCsv,
  parseNumericText,
  resolvePath,
  validateStructuredDocument,
} from './schema-validator';
import { AuditStage, FindingLevel, ResourceKind, StructuredFileResource } from '../types';

const NOW = new Date('2025-09-19T12:00:00.000Z');

const pressure: StructuredFileResource = {
  id: 'ingest:pressure',
  kind: ResourceKind.StructuredFile,
  stage: AuditStage.Ingest,
  locator: '/pipeline/data/pressure_btc.json',
  format: 'json',
  requiredKeys: ['components', 'pressure', 'source'],
  numericRange: { key: 'pressure', min: -1, max: 1 },
};

const headlines: StructuredFileResource = {
  id: 'ingest:headlines',
  kind: ResourceKind.StructuredFile,
  stage: AuditStage.Ingest,
  locator: '/pipeline/data/headlines.csv',
  format: 'csv',
  requiredKeys: [],
};

describe('schema-validator', () => {
  describe('resolvePath', () => {
    it('should walk nested keys', () => {
      expect(resolvePath({ a: { b: 2 } }, 'a.b')).toEqual({ present: true, value: 2 });
      expect(resolvePath({ a: { b: 2 } }, 'a.c')).toEqual({ present: false, value: undefined });
    });

    it('should count a null value as present', () => {
      expect(resolvePath({ a: null }, 'a').present).toBe(true);
    });

    it('should not descend into arrays', () => {
      expect(resolvePath({ a: [1] }, 'a.0').present).toBe(false);
    });
  });

  describe('findMissingKeys', () => {
    it('should return missing keys sorted and de-duplicated', () => {
      expect(findMissingKeys({ b: 1 }, ['z', 'a', 'z', 'b'])).toEqual(['a', 'z']);
    });

    it('should treat a non-object document as missing everything', () => {
      expect(findMissingKeys([1, 2], ['a'])).toEqual(['a']);
    });
  });

  describe('parseCsv', () => {
    it('should handle quoted fields with commas and escaped quotes', () => {
      expect(parseCsv('a,"b,c","d""e"\n')).toEqual({ ok: true, value: [['a', 'b,c', 'd"e']] });
    });

    it('should accept CRLF line endings and skip blank lines', () => {
      expect(parseCsv('a,b\r\n\r\n1,2\r\n')).toEqual({
        ok: true,
        value: [
          ['a', 'b'],
          ['1', '2'],
        ],
      });
    });

    it('should keep a final row without a trailing newline', () => {
      expect(parseCsv('x\ny')).toEqual({ ok: true, value: [['x'], ['y']] });
    });

    it('should fail on an unterminated quote', () => {
      expect(parseCsv('"abc,def\n')).toEqual({ ok: false, error: 'unterminated quoted field' });
    });

    it('should fail on an empty document', () => {
      expect(parseCsv('\n\n')).toEqual({ ok: false, error: 'empty document' });
    });
  });

  describe('evaluateRange', () => {
    const range = { key: 'pressure', min: -1, max: 1 };

    it.each([-1, 0, 1])('should accept %p inside the closed interval', (value) => {
      expect(evaluateRange({ pressure: value }, range).valid).toBe(true);
    });

    it.each([-1.0001, 1.0001])('should reject %p outside the interval', (value) => {
      expect(evaluateRange({ pressure: value }, range).valid).toBe(false);
    });

    it('should reject numeric strings', () => {
      expect(evaluateRange({ pressure: '0.5' }, range)).toEqual({ valid: false, present: true, value: '0.5' });
    });

    it('should reject an absent key', () => {
      expect(evaluateRange({}, range)).toEqual({ valid: false, present: false, value: undefined });
    });
  });

  describe('parseNumericText', () => {
    it('should parse a trimmed number', () => {
      expect(parseNumericText(' 0.42\n')).toBe(0.42);
    });

    it('should parse signed and exponent forms', () => {
      expect(parseNumericText('-.5')).toBe(-0.5);
      expect(parseNumericText('1e3')).toBe(1000);
    });

    it.each(['', 'N/A', 'Infinity', '0x1A', '0b1', '0o7'])('should return null for %p', (text) => {
      expect(parseNumericText(text)).toBeNull();
    });
  });

  describe('validateStructuredDocument', () => {
    it('should accept a complete document in range', () => {
      const findings = validateStructuredDocument(
        pressure,
        JSON.stringify({ components: {}, pressure: -0.2, source: 'x' }),
        NOW
      );

      expect(findings.map((f) => [f.level, f.message])).toEqual([
        [FindingLevel.OK, 'schema complete (3 keys)'],
        [FindingLevel.OK, 'pressure=-0.2 within [-1, 1]'],
      ]);
    });

    it('should report missing keys and the absent range value separately', () => {
      const findings = validateStructuredDocument(pressure, JSON.stringify({ source: 'x' }), NOW);

      expect(findings.map((f) => [f.level, f.message, f.code])).toEqual([
        [FindingLevel.Warn, 'missing keys: components, pressure', 'invalid_schema'],
        [FindingLevel.Warn, 'pressure invalid or out of range [-1, 1]', 'out_of_range_value'],
      ]);
      expect(findings[0].details).toEqual({ missingKeys: ['components', 'pressure'] });
    });

    it('should yield exactly one finding for unparseable JSON', () => {
      const findings = validateStructuredDocument(pressure, '{"pressure":', NOW);

      expect(findings).toHaveLength(1);
      expect(findings[0].level).toBe(FindingLevel.Warn);
      expect(findings[0].code).toBe('parse_failure');
      expect(findings[0].message.startsWith('parse failed: ')).toBe(true);
    });

    it('should count rows of a headerless CSV', () => {
      const findings = validateStructuredDocument(headlines, 'a,b\nc,d\n', NOW);

      expect(findings.map((f) => f.message)).toEqual(['parsed (2 rows)']);
    });

    it('should check CSV columns against the header row', () => {
      const withColumns = { ...headlines, requiredKeys: ['ts', 'title'] };
      const findings = validateStructuredDocument(withColumns, 'ts,source\n1,x\n', NOW);

      expect(findings.map((f) => f.message)).toEqual(['missing keys: title']);
    });
  });
});
