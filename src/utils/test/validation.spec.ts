import { idSchema, MAX_INT, paginationSchema } from '../validation';

describe('validation helpers', () => {
  it('should coerce a path id', () => {
    expect(idSchema.parse('42')).toBe(42);
  });

  it('should accept the largest INTEGER id and reject the next one', () => {
    expect(idSchema.parse(String(MAX_INT))).toBe(2147483647);
    expect(idSchema.safeParse('2147483648').success).toBe(false);
    expect(idSchema.safeParse('99999999999999999999').success).toBe(false);
  });

  it('should reject a skip beyond the INTEGER range', () => {
    expect(paginationSchema.safeParse({ skip: '3000000000' }).success).toBe(false);
    expect(paginationSchema.parse({})).toEqual({ skip: 0, limit: 100 });
  });
});
