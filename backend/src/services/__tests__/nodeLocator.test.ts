import { loadUiVariants } from '../../config/uiVariants';
import type { UiTreeNode } from '../../types/uiTree';
import { NodeLocator, captionOf } from '../locator/nodeLocator';
import { NodeAccessLayer } from '../node-access/snapshot';
import { TreeUiPlatform } from '../platform/treePlatform';
import { loadFixtureTree, type FixtureName } from '../../../tests/helpers/fixtures';
import { ScriptedDriver } from '../../../tests/helpers/scriptedDriver';
import { buildTree } from '../../../tests/helpers/uiTreeBuilder';

const variants = loadUiVariants();

describe('NodeLocator', () => {
  const locator = new NodeLocator(variants.roles);
  let platform: TreeUiPlatform;
  let access: NodeAccessLayer;

  const onTree = (tree: UiTreeNode | null) => {
    platform = new TreeUiPlatform(async () => tree, new ScriptedDriver());
    access = new NodeAccessLayer(platform);
  };

  const onFixture = (name: FixtureName) => onTree(loadFixtureTree(name));

  afterEach(() => {
    expect(platform.stats().outstanding).toBe(0);
  });

  it('locates the accept button by identifier and caption', async () => {
    onFixture('incoming-connection');

    await access.withSnapshot(async snapshot => {
      const target = locator.locate(snapshot, 'accept-button');

      expect(target).toMatchObject({ role: 'accept-button', strategy: 'identifier', caption: 'ACCEPT', escalate: false });
      expect(target?.node.viewId).toBe('android:id/button1');
      expect(snapshot.outstanding).toBe(2);
    });
  });

  it('ignores a reused identifier whose caption belongs to another action', async () => {
    onFixture('share-dialog');

    await access.withSnapshot(async snapshot => {
      const target = locator.locate(snapshot, 'confirm-button');

      // button1 reads "Next" here; the structural fallback skips "Cancel"
      expect(target?.strategy).toBe('structural');
      expect(target?.caption).toBe('Next');
      expect(snapshot.outstanding).toBe(2);
    });
  });

  it('walks up from a plain label to its clickable grandparent', async () => {
    onFixture('share-chooser');

    await access.withSnapshot(async snapshot => {
      const target = locator.locate(snapshot, 'entire-screen-option');

      expect(target?.strategy).toBe('text');
      expect(target?.escalate).toBe(true);
      expect(target?.node.className).toBe('android.widget.LinearLayout');
      expect(target?.node.clickable).toBe(true);
      expect(target?.node.bounds).toEqual({ left: 89, top: 1210, right: 991, bottom: 1399 });
      expect(snapshot.outstanding).toBe(2);
    });
  });

  it('reads the spinner caption from its first labelled child', async () => {
    onFixture('share-confirm');

    await access.withSnapshot(async snapshot => {
      const spinner = locator.locate(snapshot, 'mode-spinner');

      expect(spinner?.strategy).toBe('identifier');
      expect(spinner?.caption).toBe('Share entire screen');
      if (spinner) {
        expect(captionOf(snapshot, spinner.node)).toBe('Share entire screen');
      }
    });
  });

  it('returns null and holds nothing but the root when no strategy matches', async () => {
    onFixture('launcher');

    await access.withSnapshot(async snapshot => {
      expect(locator.locate(snapshot, 'accept-button')).toBeNull();
      expect(locator.locate(snapshot, 'confirm-button')).toBeNull();
      expect(snapshot.outstanding).toBe(1);
    });
  });

  it('falls back to absolute bounds when the caption changed', async () => {
    onTree(
      buildTree({
        children: [
          {
            className: 'android.widget.LinearLayout',
            clickable: true,
            bounds: [89, 1210, 991, 1399],
            children: [{ className: 'android.widget.TextView', text: 'Whole display' }]
          }
        ]
      })
    );

    await access.withSnapshot(async snapshot => {
      const target = locator.locate(snapshot, 'entire-screen-option');

      expect(target?.strategy).toBe('bounds');
      expect(target?.caption).toBe('Whole display');
    });
  });

  it('skips a non-clickable node at the fallback bounds', async () => {
    onTree(
      buildTree({
        children: [
          {
            className: 'android.widget.FrameLayout',
            bounds: [89, 1210, 991, 1399],
            children: [{ className: 'android.widget.TextView', text: 'Whole display' }]
          }
        ]
      })
    );

    await access.withSnapshot(async snapshot => {
      expect(locator.locate(snapshot, 'entire-screen-option')).toBeNull();
      expect(snapshot.outstanding).toBe(1);
    });
  });

  it('discards a caption match without an interactive ancestor', async () => {
    onTree(
      buildTree({
        children: [
          {
            className: 'android.widget.LinearLayout',
            bounds: [0, 0, 500, 100],
            children: [{ className: 'android.widget.TextView', text: 'Share entire screen' }]
          }
        ]
      })
    );

    await access.withSnapshot(async snapshot => {
      expect(locator.locate(snapshot, 'entire-screen-option')).toBeNull();
      expect(snapshot.outstanding).toBe(1);
    });
  });

  it('prefers the exact caption on a button over a partial one', async () => {
    onTree(
      buildTree({
        children: [
          { className: 'android.widget.Button', text: 'Share one app', clickable: true },
          { className: 'android.widget.Button', text: 'Share screen', clickable: true }
        ]
      })
    );

    await access.withSnapshot(async snapshot => {
      const target = locator.locate(snapshot, 'confirm-button');

      expect(target?.strategy).toBe('text');
      expect(target?.caption).toBe('Share screen');
    });
  });
});
