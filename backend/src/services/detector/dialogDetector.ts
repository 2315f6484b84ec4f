/**
 * Dialog Detector
 *
 * Scores a snapshot against a dialog shape by summing the weights of the
 * independent evidence signals that fire. A shape is confirmed when the
 * score reaches the shape's threshold and no required signal is missing.
 */

import type { CaptionPattern, EvidenceProbe, ShapeDefinition, UiVariants } from '../../config/uiVariants';
import type { DialogShape, EvidenceReport, EvidenceSignal } from '../../types/flow';
import { createServiceLogger } from '../logger';
import { captionMatches, captionOf, type NodeLocator } from '../locator/nodeLocator';
import type { Snapshot } from '../node-access/snapshot';

const log = createServiceLogger('dialog-detector');

/** What a fired probe observed; null when it did not fire */
type ProbeResult = string | null;

const matchesAny = (caption: string | null, patterns: CaptionPattern[]): boolean =>
  patterns.some(pattern => captionMatches(caption, pattern.value, pattern.match));

export class DialogDetector {
  constructor(
    private readonly shapes: UiVariants['shapes'],
    private readonly locator: NodeLocator
  ) {}

  shape(shape: DialogShape): ShapeDefinition {
    return this.shapes[shape];
  }

  classify(snapshot: Snapshot, shape: DialogShape, traceId?: string): EvidenceReport {
    const definition = this.shapes[shape];
    const signals: EvidenceSignal[] = [];
    const missingRequired: string[] = [];

    for (const signal of definition.signals) {
      const detail = this.probe(snapshot, signal.probe);
      if (detail !== null) {
        signals.push({ name: signal.name, weight: signal.weight, detail });
      } else if (signal.required) {
        missingRequired.push(signal.name);
      }
    }

    const score = signals.reduce((sum, signal) => sum + signal.weight, 0);
    const report: EvidenceReport = {
      shape,
      score,
      threshold: definition.threshold,
      confirmed: score >= definition.threshold && missingRequired.length === 0,
      signals,
      missingRequired
    };

    log.debug('dialog_classified', `${shape}: score ${score}/${definition.threshold}`, traceId, {
      shape,
      score,
      confirmed: report.confirmed,
      signals: signals.map(signal => signal.name),
      missingRequired
    });

    return report;
  }

  private probe(snapshot: Snapshot, probe: EvidenceProbe): ProbeResult {
    switch (probe.kind) {
      case 'identifier': {
        for (const id of probe.ids) {
          const node = snapshot.queryFirst({ kind: 'identifier', id });
          if (node) {
            snapshot.release(node);
            return id;
          }
        }
        return null;
      }

      case 'identifier-text': {
        let found: ProbeResult = null;
        for (const node of snapshot.query({ kind: 'identifier', id: probe.id })) {
          if (found === null) {
            const caption = captionOf(snapshot, node);
            if (matchesAny(caption, probe.patterns)) {
              found = caption;
            }
          }
          snapshot.release(node);
        }
        return found;
      }

      case 'roles': {
        for (const role of probe.roles) {
          const target = this.locator.locate(snapshot, role);
          if (!target) {
            return null;
          }
          snapshot.release(target.node);
        }
        return probe.roles.join('+');
      }

      case 'text': {
        const node = snapshot.queryFirst({ kind: 'text', text: probe.text });
        if (!node) return null;
        snapshot.release(node);
        return probe.text;
      }

      case 'list':
        return this.probeList(snapshot, probe);

      case 'bounds': {
        const node = snapshot.queryFirst({ kind: 'bounds', bounds: probe.bounds });
        if (!node) return null;
        snapshot.release(node);
        const { left, top, right, bottom } = probe.bounds;
        return `[${left},${top}][${right},${bottom}]`;
      }

      case 'role-caption': {
        const target = this.locator.locate(snapshot, probe.role);
        if (!target) return null;
        snapshot.release(target.node);
        return matchesAny(target.caption, probe.patterns) ? target.caption : null;
      }

      case 'first-of': {
        for (const inner of probe.probes) {
          const detail = this.probe(snapshot, inner);
          if (detail !== null) {
            return detail;
          }
        }
        return null;
      }
    }
  }

  /**
   * A list container with at least `childCount` direct children whose
   * caption contains `childTextContains`
   */
  private probeList(snapshot: Snapshot, probe: Extract<EvidenceProbe, { kind: 'list' }>): ProbeResult {
    let found: ProbeResult = null;

    for (const list of snapshot.query({ kind: 'structural', classNameContains: probe.classNameContains })) {
      if (found === null) {
        let matching = 0;
        for (let index = 0; index < list.childCount; index++) {
          const item = snapshot.childAt(list, index);
          if (!item) continue;
          if (captionMatches(captionOf(snapshot, item), probe.childTextContains, 'contains')) {
            matching++;
          }
          snapshot.release(item);
        }
        if (matching >= probe.childCount) {
          found = `${list.className ?? 'list'} with ${matching} items`;
        }
      }
      snapshot.release(list);
    }
    return found;
  }
}
