import {
  Equals,
  GreaterThan,
  GreaterThanOrEquals,
  ILike,
  InList,
  IsNone,
  IsNotNone,
  LessThanOrEquals,
  NotEquals,
  Like,
  NotInList,
  NotSubList,
  SubList,
} from './field-specification';
import { UnboundSpecificationValueError } from './specification.errors';

describe('FieldSpecification', () => {
  describe('binding', () => {
    it('should keep the template unbound after newWithValue', () => {
      const template = Equals('name');
      const bound = template.newWithValue('Food');

      expect(template.isBound).toBe(false);
      expect(bound.isBound).toBe(true);
      expect(bound.value).toBe('Food');
    });

    it('should throw when an unbound value is read', () => {
      expect(() => Equals('name').value).toThrow(UnboundSpecificationValueError);
    });

    it('should throw when an unbound specification is evaluated', () => {
      expect(() => Equals('name').isSatisfiedBy({ name: 'Food' })).toThrow(
        'EqualsSpecification for field "name" has no bound value',
      );
    });
  });

  describe('comparison', () => {
    it('should read dotted field paths', () => {
      const spec = Equals('building.address').newWithValue('Main st. 1');

      expect(spec.isSatisfiedBy({ building: { address: 'Main st. 1' } })).toBe(true);
      expect(spec.isSatisfiedBy({ building: null })).toBe(false);
    });

    it('should compare numbers with ordering predicates', () => {
      expect(GreaterThan('n').newWithValue(5).isSatisfiedBy({ n: 6 })).toBe(true);
      expect(GreaterThanOrEquals('n').newWithValue(5).isSatisfiedBy({ n: 5 })).toBe(true);
      expect(LessThanOrEquals('n').newWithValue(5).isSatisfiedBy({ n: 6 })).toBe(false);
    });

    it('should treat -0 as equal to 0 like the ordering and list predicates', () => {
      const candidate = { n: -0 };

      expect(Equals('n').newWithValue(0).isSatisfiedBy(candidate)).toBe(true);
      expect(NotEquals('n').newWithValue(0).isSatisfiedBy(candidate)).toBe(false);
      expect(GreaterThanOrEquals('n').newWithValue(0).isSatisfiedBy(candidate)).toBe(true);
      expect(LessThanOrEquals('n').newWithValue(0).isSatisfiedBy(candidate)).toBe(true);
      expect(InList('n').newWithValue([0]).isSatisfiedBy(candidate)).toBe(true);
    });

    it('should throw TypeError for values that are not comparable', () => {
      expect(() =>
        GreaterThan('n').newWithValue(5).isSatisfiedBy({ n: 'five' }),
      ).toThrow(TypeError);
    });
  });

  describe('lists', () => {
    it('should match inList by membership', () => {
      const spec = InList('id').newWithValue(['a', 'b']);

      expect(spec.isSatisfiedBy({ id: 'a' })).toBe(true);
      expect(spec.isSatisfiedBy({ id: 'c' })).toBe(false);
      expect(NotInList('id').newWithValue(['a', 'b']).isSatisfiedBy({ id: 'c' })).toBe(true);
    });

    it('should match subList when every bound value is in the field', () => {
      const candidate = { phoneNumbers: ['+100000001', '+100000002'] };

      expect(SubList('phoneNumbers').newWithValue(['+100000001']).isSatisfiedBy(candidate)).toBe(true);
      expect(
        SubList('phoneNumbers')
          .newWithValue(['+100000001', '+100000003'])
          .isSatisfiedBy(candidate),
      ).toBe(false);
      expect(
        NotSubList('phoneNumbers')
          .newWithValue(['+100000003'])
          .isSatisfiedBy(candidate),
      ).toBe(true);
    });

    it('should throw TypeError when subList field is not a list', () => {
      expect(() =>
        SubList('phoneNumbers').newWithValue(['x']).isSatisfiedBy({ phoneNumbers: 'x' }),
      ).toThrow('Field "phoneNumbers" is not a list');
    });
  });

  describe('like', () => {
    it('should treat % and _ in the value literally', () => {
      const spec = Like('title').newWithValue('50%_off');

      expect(spec.isSatisfiedBy({ title: 'Sale 50%_off today' })).toBe(true);
      expect(spec.isSatisfiedBy({ title: 'Sale 50 percent off' })).toBe(false);
      expect(spec.isSatisfiedBy({ title: 'Sale 50%Xoff' })).toBe(false);
    });

    it('should be case-sensitive for like and case-insensitive for iLike', () => {
      expect(Like('name').newWithValue('food').isSatisfiedBy({ name: 'Fast Food' })).toBe(false);
      expect(ILike('name').newWithValue('food').isSatisfiedBy({ name: 'Fast Food' })).toBe(true);
    });

    it('should not match a missing field', () => {
      expect(ILike('name').newWithValue('a').isSatisfiedBy({})).toBe(false);
    });
  });

  describe('isNone / isNotNone', () => {
    it('should invert the meaning with the flag', () => {
      expect(IsNone('parentId').newWithValue(true).isSatisfiedBy({ parentId: null })).toBe(true);
      expect(IsNone('parentId').newWithValue(false).isSatisfiedBy({ parentId: null })).toBe(false);
      expect(IsNotNone('parentId').newWithValue(true).isSatisfiedBy({ parentId: 'a' })).toBe(true);
      expect(IsNotNone('parentId').newWithValue(false).isSatisfiedBy({ parentId: 'a' })).toBe(false);
    });
  });

  describe('evaluate', () => {
    it('should report the failing predicate by name', () => {
      const result = Equals('name').newWithValue('Food').evaluate({ name: 'Cars' });

      expect(result).toEqual({
        satisfied: false,
        errors: { EqualsSpecification: 'Matches when field == value.' },
      });
    });

    it('should merge errors of both sides of and', () => {
      const spec = Equals('name')
        .newWithValue('Food')
        .and(GreaterThan('level').newWithValue(1));

      expect(spec.evaluate({ name: 'Cars', level: 1 })).toEqual({
        satisfied: false,
        errors: {
          EqualsSpecification: 'Matches when field == value.',
          GreaterThanSpecification: 'Matches when field > value.',
        },
      });
    });

    it('should keep errors of the failing side of a satisfied or', () => {
      const spec = Equals('name')
        .newWithValue('Food')
        .or(GreaterThan('level').newWithValue(1));

      expect(spec.evaluate({ name: 'Food', level: 1 })).toEqual({
        satisfied: true,
        errors: { GreaterThanSpecification: 'Matches when field > value.' },
      });
    });

    it('should report not under the inner name', () => {
      const spec = Equals('name').newWithValue('Food').not();

      expect(spec.evaluate({ name: 'Food' })).toEqual({
        satisfied: false,
        errors: {
          EqualsSpecification:
            'Expected condition to NOT satisfy: Matches when field == value.',
        },
      });
      expect(spec.evaluate({ name: 'Cars' })).toEqual({ satisfied: true, errors: {} });
    });
  });
});
