/**
 * Tests for diagnostic rendering and failure messages
 */

import { AssertionLayer } from '../../src/layer';
import { Assertion, and, negate, or } from '../../src/assertions/assertion';
import { COLORS } from '../../src/assertions/render';
import { AssertionFailedError } from '../../src/errors';

const green = (text: string): string => `${COLORS.green}${text}${COLORS.reset}`;
const red = (text: string): string => `${COLORS.red}${text}${COLORS.reset}`;

/**
 * (A && B) || (C && !D)
 */
function buildTree(layer: AssertionLayer): Assertion {
  const a = layer.matches('A');
  const b = layer.matches('B');
  const c = layer.matches('C');
  const d = layer.matches('D');
  return or(and(a, b), and(c, negate(d)));
}

function captureFailure(assertion: Assertion, label?: string): AssertionFailedError {
  try {
    assertion.assert(label);
  } catch (e) {
    if (e instanceof AssertionFailedError) {
      return e;
    }
    throw e;
  }
  throw new Error('expected assert() to fail');
}

describe('assertions/render', () => {
  it('marks each leaf by its current state and keeps the parenthesization', () => {
    const layer = new AssertionLayer();
    const tree = buildTree(layer);
    layer.deliver('A');

    const failure = captureFailure(tree);

    expect(failure.rendered).toBe(
      `((${green('"A"')} && ${red('"B"')}) || (${red('"C"')} && !${red('"D"')}))`
    );
    expect(failure.plain).toBe('(("A" && "B") || ("C" && !"D"))');
    expect(failure.message).toBe('assertion failed: (("A" && "B") || ("C" && !"D"))');
    expect(failure.label).toBeUndefined();
  });

  it('includes the label in the failure message', () => {
    const layer = new AssertionLayer();
    const failure = captureFailure(layer.matches('done'), 'job finished');

    expect(failure.message).toBe('assertion \'job finished\' failed: "done"');
    expect(failure.label).toBe('job finished');
  });

  it('leaves escape codes out when the layer disables colour', () => {
    const layer = new AssertionLayer({ color: false });
    const tree = buildTree(layer);

    const failure = captureFailure(tree);

    expect(failure.rendered).toBe('(("A" && "B") || ("C" && !"D"))');
    expect(failure.rendered).toBe(failure.plain);
  });

  it('honours a per-call colour option', () => {
    const layer = new AssertionLayer({ color: false });
    const ready = layer.matches('ready');

    expect(ready.render()).toBe('"ready"');
    expect(ready.render({ color: true })).toBe(red('"ready"'));
  });

  it('shows every leaf as satisfied while the layer is disabled', () => {
    const layer = new AssertionLayer();
    const tree = buildTree(layer);

    layer.disable();

    expect(tree.render()).toBe(
      `((${green('"A"')} && ${green('"B"')}) || (${green('"C"')} && !${green('"D"')}))`
    );
  });

  it('renders patterns in slash form', () => {
    const layer = new AssertionLayer({ color: false });
    const tree = and(layer.matchesPattern(/^GET \/health/i), negate(layer.matches('500')));

    expect(tree.toString()).toBe('(/^GET \\/health/i && !"500")');
  });
});
