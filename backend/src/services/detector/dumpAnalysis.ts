/**
 * Offline analysis of saved uiautomator dumps: every dialog shape is
 * classified and every target role located against the same snapshot.
 */

import type { UiVariants } from '../../config/uiVariants';
import { DIALOG_SHAPES, TARGET_ROLES } from '../../config/uiVariants';
import type { EvidenceReport, TargetRole } from '../../types/flow';
import type { UiTreeNode } from '../../types/uiTree';
import { parseUiHierarchy, walkTree } from '../../utils/uiHierarchy';
import { NodeLocator } from '../locator/nodeLocator';
import { NodeAccessLayer } from '../node-access/snapshot';
import type { HandleStats } from '../platform/uiPlatform';
import { TreeUiPlatform, type ActionDriver } from '../platform/treePlatform';
import { DialogDetector } from './dialogDetector';

export interface LocatedRole {
  role: TargetRole;
  found: boolean;
  strategy?: string;
  caption?: string | null;
  className?: string | null;
}

export interface DumpAnalysis {
  nodeCount: number;
  reports: EvidenceReport[];
  roles: LocatedRole[];
  handles: HandleStats;
}

/** Offline analysis never acts on the tree */
const inertDriver: ActionDriver = {
  perform: async () => false
};

export const countNodes = (root: UiTreeNode | null): number => (root ? [...walkTree(root)].length : 0);

export async function analyzeDump(xml: string, variants: UiVariants): Promise<DumpAnalysis> {
  const tree = parseUiHierarchy(xml);
  const platform = new TreeUiPlatform(async () => tree, inertDriver);
  const access = new NodeAccessLayer(platform);
  const locator = new NodeLocator(variants.roles);
  const detector = new DialogDetector(variants.shapes, locator);

  const analysed = await access.withSnapshot(async snapshot => {
    const reports = DIALOG_SHAPES.map(shape => detector.classify(snapshot, shape));
    const roles = TARGET_ROLES.map((role): LocatedRole => {
      const target = locator.locate(snapshot, role);
      if (!target) {
        return { role, found: false };
      }
      const located: LocatedRole = {
        role,
        found: true,
        strategy: target.strategy,
        caption: target.caption,
        className: target.node.className
      };
      snapshot.release(target.node);
      return located;
    });
    return { reports, roles };
  });

  return {
    nodeCount: countNodes(tree),
    reports: analysed?.reports ?? [],
    roles: analysed?.roles ?? [],
    handles: platform.stats()
  };
}
