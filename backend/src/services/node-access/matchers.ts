import type { Bounds, MatchCriteria, UiNode } from '../../types/uiTree';

export const isInteractive = (node: UiNode): boolean => node.clickable && node.enabled;

export const boundsEqual = (a: Bounds, b: Bounds): boolean =>
  a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;

const containsIgnoringCase = (value: string | null, needle: string): boolean =>
  value !== null && value.toLowerCase().includes(needle.toLowerCase());

/**
 * Single predicate behind every snapshot query
 */
export function matchesCriteria(node: UiNode, criteria: MatchCriteria): boolean {
  switch (criteria.kind) {
    case 'identifier':
      return node.viewId === criteria.id;

    case 'text':
      return containsIgnoringCase(node.text, criteria.text) || containsIgnoringCase(node.contentDescription, criteria.text);

    case 'structural':
      if (criteria.classNameContains !== undefined && !(node.className ?? '').includes(criteria.classNameContains)) {
        return false;
      }
      if (criteria.clickable !== undefined && node.clickable !== criteria.clickable) {
        return false;
      }
      if (criteria.enabled !== undefined && node.enabled !== criteria.enabled) {
        return false;
      }
      return true;

    case 'bounds':
      if (!boundsEqual(node.bounds, criteria.bounds)) {
        return false;
      }
      return criteria.clickable === undefined || node.clickable === criteria.clickable;
  }
}

export const describeCriteria = (criteria: MatchCriteria): string => {
  switch (criteria.kind) {
    case 'identifier':
      return `id=${criteria.id}`;
    case 'text':
      return `text~"${criteria.text}"`;
    case 'structural':
      return `class~${criteria.classNameContains ?? '*'} clickable=${criteria.clickable ?? '*'} enabled=${criteria.enabled ?? '*'}`;
    case 'bounds': {
      const { left, top, right, bottom } = criteria.bounds;
      return `bounds=[${left},${top}][${right},${bottom}]`;
    }
  }
};
