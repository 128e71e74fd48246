import { fold, Left, left, Right, right } from '@application/common';

describe('Either', () => {
  it('should build a left value', () => {
    const result = left<string, number>('no burger');

    expect(result).toBeInstanceOf(Left);
    expect(result.isLeft()).toBe(true);
    expect(result.isRight()).toBe(false);
    expect(result.value).toBe('no burger');
  });

  it('should build a right value', () => {
    const result = right<string, number>(2);

    expect(result).toBeInstanceOf(Right);
    expect(result.isLeft()).toBe(false);
    expect(result.isRight()).toBe(true);
    expect(result.value).toBe(2);
  });

  describe('fold', () => {
    it('should apply onLeft to a left value', () => {
      const result = fold(
        left<string, number>('no burger'),
        (error) => `failed: ${error}`,
        (count) => `got ${count}`,
      );

      expect(result).toBe('failed: no burger');
    });

    it('should apply onRight to a right value', () => {
      const result = fold(
        right<string, number>(2),
        (error) => `failed: ${error}`,
        (count) => `got ${count}`,
      );

      expect(result).toBe('got 2');
    });
  });
});
