import { applyLineFeedHandling, LineFeedHandling } from '../text/line-ending.js';
import { parseMarked } from '../text/markers.js';
import type { Selection } from '../text/selection.js';

/**
 * One keys-in, document-out check. Both literals carry selection markers and
 * are normalized by `lineFeedHandling` before they are parsed.
 */
interface TestCase {
  readonly inText: string;
  readonly inSelection: Selection;
  readonly inKeys: string;
  readonly outText: string;
  readonly outSelection: Selection;
  readonly lineFeedHandling: LineFeedHandling;
}

type TestCaseTuple = readonly [
  input: string,
  keys: string,
  output: string,
  handling?: LineFeedHandling,
];

function createTestCase(
  input: string,
  keys: string,
  output: string,
  handling: LineFeedHandling = LineFeedHandling.Native,
): TestCase {
  const parsedInput = parseMarked(applyLineFeedHandling(handling, input));
  const parsedOutput = parseMarked(applyLineFeedHandling(handling, output));
  return Object.freeze({
    inText: parsedInput.text,
    inSelection: parsedInput.selection,
    inKeys: keys,
    outText: parsedOutput.text,
    outSelection: parsedOutput.selection,
    lineFeedHandling: handling,
  });
}

function toTestCase(tuple: TestCaseTuple): TestCase {
  const [input, keys, output, handling] = tuple;
  return createTestCase(input, keys, output, handling);
}

export { createTestCase, toTestCase };
export type { TestCase, TestCaseTuple };
