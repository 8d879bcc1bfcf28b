import Activation from '../../src/methods/activation';

describe('Activation', () => {
  describe('logistic()', () => {
    it('returns 0.5 at 0', () => {
      // Act
      const result = Activation.logistic(0);
      // Assert
      expect(result).toBe(0.5);
    });

    it('is symmetric around 0.5', () => {
      // Act
      const sum = Activation.logistic(1.3) + Activation.logistic(-1.3);
      // Assert
      expect(sum).toBeCloseTo(1, 12);
    });

    it('returns fx * (1 - fx) when derivate is true', () => {
      // Act
      const result = Activation.logistic(0, true);
      // Assert
      expect(result).toBe(0.25);
    });
  });

  describe('logisticGradientFromOutput()', () => {
    it('matches the derivative computed from the input', () => {
      // Arrange
      const x = 0.7;
      // Act
      const result = Activation.logisticGradientFromOutput(Activation.logistic(x));
      // Assert
      expect(result).toBe(Activation.logistic(x, true));
    });
  });

  describe('identity()', () => {
    it('returns its input', () => {
      // Act
      const result = Activation.identity(-4.5);
      // Assert
      expect(result).toBe(-4.5);
    });

    it('has derivative 1', () => {
      // Act
      const result = Activation.identity(-4.5, true);
      // Assert
      expect(result).toBe(1);
    });
  });
});
