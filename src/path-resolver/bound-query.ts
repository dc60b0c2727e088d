import type { Path } from '../types';
import type { Outcome } from './outcome';
import type { PathResolver } from './resolver';

/**
 * A nested value held together with the resolver that queries it
 */
export class BoundQuery {
  constructor(
    private readonly resolver: PathResolver,
    readonly value: unknown,
  ) {}

  get(path: Path): unknown {
    return this.resolver.resolve(this.value, path);
  }

  tryGet(path: Path): Outcome {
    return this.resolver.tryResolve(this.value, path);
  }

  has(path: Path): boolean {
    return this.resolver.has(this.value, path);
  }

  getOr(path: Path, fallback: unknown): unknown {
    return this.resolver.getOr(this.value, path, fallback);
  }

  query(expression: string): unknown {
    return this.resolver.query(this.value, expression);
  }
}
