export type SpecificationErrors = Record<string, string>;

export interface EvaluationResult {
  satisfied: boolean;
  errors: SpecificationErrors;
}

/**
 * Бизнес-правило, которое можно проверить на объекте и комбинировать
 * через and / or / not.
 *
 * `evaluate` возвращает результат вместе с ошибками, поэтому состояние
 * между вызовами не хранится.
 */
export abstract class Specification<T> {
  abstract get description(): string;

  get name(): string {
    return this.constructor.name;
  }

  abstract evaluate(candidate: T): EvaluationResult;

  isSatisfiedBy(candidate: T): boolean {
    return this.evaluate(candidate).satisfied;
  }

  and(other: Specification<T>): Specification<T> {
    return new AndSpecification(this, other);
  }

  or(other: Specification<T>): Specification<T> {
    return new OrSpecification(this, other);
  }

  not(): Specification<T> {
    return new NotSpecification(this);
  }

  toString(): string {
    return `<${this.name}: ${this.description}>`;
  }

  protected result(satisfied: boolean): EvaluationResult {
    return {
      satisfied,
      errors: satisfied ? {} : { [this.name]: this.description },
    };
  }
}

abstract class CompositeSpecification<T> extends Specification<T> {
  constructor(
    protected readonly left: Specification<T>,
    protected readonly right: Specification<T>,
  ) {
    super();
  }

  evaluate(candidate: T): EvaluationResult {
    // Обе ветки вычисляются всегда, чтобы собрать ошибки каждого листа
    const left = this.left.evaluate(candidate);
    const right = this.right.evaluate(candidate);

    return {
      satisfied: this.combine(left.satisfied, right.satisfied),
      errors: { ...left.errors, ...right.errors },
    };
  }

  protected abstract combine(left: boolean, right: boolean): boolean;
}

export class AndSpecification<T> extends CompositeSpecification<T> {
  get description(): string {
    return `(${this.left.description}) AND (${this.right.description})`;
  }

  protected combine(left: boolean, right: boolean): boolean {
    return left && right;
  }
}

export class OrSpecification<T> extends CompositeSpecification<T> {
  get description(): string {
    return `(${this.left.description}) OR (${this.right.description})`;
  }

  protected combine(left: boolean, right: boolean): boolean {
    return left || right;
  }
}

export class NotSpecification<T> extends Specification<T> {
  constructor(private readonly inner: Specification<T>) {
    super();
  }

  get description(): string {
    return `Expected condition to NOT satisfy: ${this.inner.description}`;
  }

  evaluate(candidate: T): EvaluationResult {
    const satisfied = !this.inner.evaluate(candidate).satisfied;

    return {
      satisfied,
      errors: satisfied ? {} : { [this.inner.name]: this.description },
    };
  }
}
