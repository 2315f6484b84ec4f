import { ForeignHandleError, StaleNodeError } from '../../utils/errors';
import { TreeNodeHandle, TreeUiPlatform } from '../platform/treePlatform';
import { buildTree } from '../../../tests/helpers/uiTreeBuilder';
import { ScriptedDriver } from '../../../tests/helpers/scriptedDriver';

const tree = buildTree({
  className: 'android.widget.FrameLayout',
  children: [
    { className: 'android.widget.TextView', text: 'Share your screen', id: 'app:id/title' },
    {
      className: 'android.widget.LinearLayout',
      clickable: true,
      bounds: [0, 100, 200, 200],
      children: [{ className: 'android.widget.TextView', text: 'Share entire screen', id: 'app:id/label' }]
    },
    { className: 'android.widget.ImageView', desc: 'Screen SHARE icon', id: 'app:id/label' }
  ]
});

describe('TreeUiPlatform', () => {
  let driver: ScriptedDriver;
  let platform: TreeUiPlatform;

  beforeEach(() => {
    driver = new ScriptedDriver();
    platform = new TreeUiPlatform(async () => tree, driver);
  });

  it('issues a fresh handle for every query', async () => {
    const first = await platform.rootInActiveWindow();
    const second = await platform.rootInActiveWindow();

    expect(first).toBeInstanceOf(TreeNodeHandle);
    expect(first).not.toBe(second);
    expect(platform.stats()).toEqual({ issued: 2, recycled: 0, outstanding: 2 });
  });

  it('returns null when no window is active', async () => {
    const empty = new TreeUiPlatform(async () => null, driver);
    await expect(empty.rootInActiveWindow()).resolves.toBeNull();
    expect(empty.stats().issued).toBe(0);
  });

  it('finds nodes by view id in document order', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');

    const labels = platform.findByViewId(root, 'app:id/label');
    expect(labels.map(node => node.className)).toEqual(['android.widget.TextView', 'android.widget.ImageView']);
  });

  it('matches text and content description case-insensitively', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');

    const matches = platform.findByText(root, 'share');
    expect(matches.map(node => node.text ?? node.contentDescription)).toEqual([
      'Share your screen',
      'Share entire screen',
      'Screen SHARE icon'
    ]);
  });

  it('walks children and parents', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');

    const row = platform.getChild(root, 1);
    expect(row?.clickable).toBe(true);
    expect(row?.childCount).toBe(1);
    expect(platform.getChild(root, 5)).toBeNull();

    const parent = row ? platform.getParent(row) : null;
    expect(parent?.className).toBe('android.widget.FrameLayout');
    expect(platform.getParent(root)).toBeNull();
  });

  it('counts recycled handles', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');
    const child = platform.getChild(root, 0);
    if (!child) throw new Error('no child');

    platform.recycle(child);
    expect(platform.stats()).toEqual({ issued: 2, recycled: 1, outstanding: 1 });
  });

  it('rejects reads and a second release of a recycled handle', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');

    platform.recycle(root);
    expect(() => root.text).toThrow(StaleNodeError);
    expect(() => platform.recycle(root)).toThrow(StaleNodeError);
    expect(platform.stats().recycled).toBe(1);
  });

  it('rejects handles issued by another platform', async () => {
    const other = new TreeUiPlatform(async () => tree, driver);
    const foreign = await other.rootInActiveWindow();
    if (!foreign) throw new Error('no root');

    expect(() => platform.recycle(foreign)).toThrow(ForeignHandleError);
    expect(() => platform.getChild(foreign, 0)).toThrow(ForeignHandleError);
  });

  it('forwards actions to the driver', async () => {
    const root = await platform.rootInActiveWindow();
    if (!root) throw new Error('no root');
    const row = platform.getChild(root, 1);
    if (!row) throw new Error('no row');

    await expect(platform.performAction(row, 'click')).resolves.toBe(true);
    await expect(platform.performAction(root, 'click')).resolves.toBe(false);
    expect(driver.actions.map(entry => entry.className)).toEqual([
      'android.widget.LinearLayout',
      'android.widget.FrameLayout'
    ]);
  });
});
