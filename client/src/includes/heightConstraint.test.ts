import { HeightConstraint } from './heightConstraint';

describe('HeightConstraint', () => {
  let element: HTMLElement;

  beforeEach(() => {
    element = document.createElement('textarea');
  });

  describe('find', () => {
    it('returns null when the element has no inline height', () => {
      expect(HeightConstraint.find(element)).toBeNull();
    });

    it('returns null when the inline height is not in pixels', () => {
      element.style.height = '50%';
      expect(HeightConstraint.find(element)).toBeNull();
    });

    it('discovers an existing pixel height', () => {
      element.style.height = '48px';
      const constraint = HeightConstraint.find(element);
      expect(constraint?.constant).toBe(48);
      expect(constraint?.isOwned).toBe(false);
    });
  });

  describe('create', () => {
    it('writes the initial height to the element', () => {
      const constraint = HeightConstraint.create(element, 30);
      expect(constraint.constant).toBe(30);
      expect(constraint.isOwned).toBe(true);
      expect(element.style.height).toBe('30px');
    });
  });

  it('writes every new constant to the element', () => {
    const constraint = HeightConstraint.create(element, 30);
    constraint.constant = 72;
    expect(constraint.constant).toBe(72);
    expect(element.style.height).toBe('72px');
  });

  it('clears the inline height when an owned constraint is removed', () => {
    const constraint = HeightConstraint.create(element, 30);
    constraint.remove();
    expect(element.style.height).toBe('');
  });

  it('puts back the declared height when a discovered constraint is removed', () => {
    element.style.height = '48px';
    const constraint = HeightConstraint.find(element);
    if (!constraint) throw new Error('Missing constraint');

    constraint.constant = 96;
    expect(element.style.height).toBe('96px');

    constraint.remove();
    expect(element.style.height).toBe('48px');
  });
});
