/**
 * Page Observer
 *
 * Runs one traversal against a live page: capture, reduce, write back the
 * identifier stamps, and build the payload.
 *
 * @module snapshot/page-observer
 */

import type { Page } from 'playwright';
import type { ReductionResult } from '../reduction/reduction.types.js';
import { TRAVERSAL_STAMPS } from '../reduction/constants.js';
import { IdentifierRegistry } from '../reduction/identifier-registry.js';
import { reduceDocument } from '../reduction/reducer.js';
import { collectObservation } from '../reduction/observation-collector.js';
import { applyDomStamps, captureDomSnapshot } from './dom-capture.js';
import { StampLedger, toSourceNode } from './snapshot-source.js';
import type { RawDomSnapshot } from './snapshot.types.js';
import { getLogger } from '../shared/services/logging.service.js';

/**
 * Reduce an already captured snapshot.
 *
 * Exposed separately so the reduction can run without a page.
 */
export function reduceSnapshot(snapshot: RawDomSnapshot): {
  result: ReductionResult;
  ledger: StampLedger;
} {
  const ledger = new StampLedger();
  const root = snapshot.root ? toSourceNode(snapshot.root, ledger) : null;
  const output = reduceDocument(root, new IdentifierRegistry());
  return { result: collectObservation(output), ledger };
}

/**
 * Observe the page. Errors from the page scripts propagate.
 */
export async function observePage(page: Page): Promise<ReductionResult> {
  const logger = getLogger();
  const startTime = Date.now();

  const snapshot = await page.evaluate(captureDomSnapshot);
  const { result, ledger } = reduceSnapshot(snapshot);

  const written = await page.evaluate(applyDomStamps, {
    stamps: ledger.toStamps(),
    clearAttributes: [...TRAVERSAL_STAMPS],
  });

  if (written < ledger.size) {
    logger.warning('Some identifier stamps could not be written back', {
      expected: ledger.size,
      written,
      url: snapshot.url,
    });
  }

  logger.debug('Page observed', {
    url: snapshot.url,
    elements: snapshot.elementCount,
    clickable: result.clickable_elements.length,
    inputs: result.input_elements.length,
    selects: result.select_elements.length,
    durationMs: Date.now() - startTime,
  });

  return result;
}
