import { VariableBundleUtil } from './variable-bundle.util';

describe('VariableBundleUtil', () => {
  describe('decode', () => {
    it('should decode a JSON object payload', () => {
      const result = VariableBundleUtil.decode(
        '{"mysql_port":3306,"mysql_innodb_buffer_pool_size":"32G","replicas":["a","b"]}',
      );

      expect(result).toEqual({
        kind: 'object',
        bundle: {
          mysql_port: 3306,
          mysql_innodb_buffer_pool_size: '32G',
          replicas: ['a', 'b'],
        },
      });
    });

    it('should decode an empty object', () => {
      expect(VariableBundleUtil.decode('{}')).toEqual({
        kind: 'object',
        bundle: {},
      });
    });

    it('should report invalid JSON as malformed', () => {
      const result = VariableBundleUtil.decode('not json{');

      expect(result.kind).toBe('malformed');
    });

    it('should report an empty payload as malformed', () => {
      expect(VariableBundleUtil.decode('').kind).toBe('malformed');
    });

    it('should reject a JSON array', () => {
      expect(VariableBundleUtil.decode('[1,2,3]')).toEqual({
        kind: 'not-an-object',
        actualType: 'array',
      });
    });

    it('should reject JSON scalars', () => {
      expect(VariableBundleUtil.decode('42')).toEqual({
        kind: 'not-an-object',
        actualType: 'number',
      });
      expect(VariableBundleUtil.decode('"text"')).toEqual({
        kind: 'not-an-object',
        actualType: 'string',
      });
      expect(VariableBundleUtil.decode('null')).toEqual({
        kind: 'not-an-object',
        actualType: 'null',
      });
    });
  });

  describe('isJsonObject', () => {
    it('should accept plain objects only', () => {
      expect(VariableBundleUtil.isJsonObject({ a: 1 })).toBe(true);
      expect(VariableBundleUtil.isJsonObject([])).toBe(false);
      expect(VariableBundleUtil.isJsonObject(null)).toBe(false);
      expect(VariableBundleUtil.isJsonObject('x')).toBe(false);
    });
  });
});
