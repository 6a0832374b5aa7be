import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  handleError,
  UnresolvedDependencyError,
  AmbiguousProjectError,
  DependencyCycleError
} from '../../src/utils/errors.js';
import { ErrorCodes, PathDepsError } from '../../src/types/index.js';

describe('errors', () => {
  it('names the missing dependency path', () => {
    const error = new UnresolvedDependencyError('libs/ghost', 'app');

    assert.ok(error instanceof PathDepsError);
    assert.equal(error.message, 'cannot find dependency libs/ghost');
    assert.equal(error.code, ErrorCodes.UNRESOLVED_DEPENDENCY);
    assert.deepEqual(error.details, { dependencyDir: 'libs/ghost', dependentDir: 'app' });
  });

  it('lists ambiguous candidates and cycle members', () => {
    assert.equal(
      new AmbiguousProjectError('core', ['a/core', 'b/core']).message,
      "Project 'core' is ambiguous: a/core, b/core"
    );
    assert.equal(new DependencyCycleError(['a', 'b', 'a']).message, 'Dependency cycle: a -> b -> a');
  });

  it('maps errors to failed command results', () => {
    assert.deepEqual(handleError(new UnresolvedDependencyError('x', 'y')), {
      success: false,
      error: 'cannot find dependency x'
    });
    assert.deepEqual(handleError(new Error('plain')), { success: false, error: 'plain' });
    assert.deepEqual(handleError('text'), { success: false, error: 'An unknown error occurred' });
  });
});
