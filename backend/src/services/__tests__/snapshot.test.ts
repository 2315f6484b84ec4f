import { SnapshotInUseError, StaleNodeError } from '../../utils/errors';
import { NodeAccessLayer } from '../node-access/snapshot';
import { TreeUiPlatform } from '../platform/treePlatform';
import { buildTree } from '../../../tests/helpers/uiTreeBuilder';
import { ScriptedDriver } from '../../../tests/helpers/scriptedDriver';

const tree = buildTree({
  className: 'android.widget.FrameLayout',
  children: [
    {
      className: 'android.widget.LinearLayout',
      children: [
        { className: 'android.widget.Button', text: 'Cancel', id: 'android:id/button2', clickable: true, bounds: [0, 0, 100, 50] },
        { className: 'android.widget.Button', text: 'Start', id: 'android:id/button1', clickable: true, bounds: [100, 0, 200, 50] }
      ]
    },
    { className: 'android.widget.Button', text: 'Help', clickable: false, bounds: [0, 60, 100, 110] }
  ]
});

describe('Node access layer', () => {
  let platform: TreeUiPlatform;
  let access: NodeAccessLayer;

  beforeEach(() => {
    platform = new TreeUiPlatform(async () => tree, new ScriptedDriver());
    access = new NodeAccessLayer(platform);
  });

  describe('acquireSnapshot', () => {
    it('returns null without an active window', async () => {
      const empty = new NodeAccessLayer(new TreeUiPlatform(async () => null, new ScriptedDriver()));
      await expect(empty.acquireSnapshot()).resolves.toBeNull();
      expect(empty.hasLiveSnapshot).toBe(false);
    });

    it('allows only one live snapshot', async () => {
      const snapshot = await access.acquireSnapshot();
      await expect(access.acquireSnapshot()).rejects.toBeInstanceOf(SnapshotInUseError);

      snapshot?.close();
      const next = await access.acquireSnapshot();
      expect(next).not.toBeNull();
      next?.close();
    });

    it('frees the slot when the platform fails', async () => {
      const failing = new NodeAccessLayer(
        new TreeUiPlatform(async () => {
          throw new Error('dump failed');
        }, new ScriptedDriver())
      );

      await expect(failing.acquireSnapshot()).rejects.toThrow('dump failed');
      expect(failing.hasLiveSnapshot).toBe(false);
    });
  });

  describe('query', () => {
    it('finds identifier matches and keeps them until released', async () => {
      await access.withSnapshot(async snapshot => {
        const [start] = snapshot.query({ kind: 'identifier', id: 'android:id/button1' });
        expect(start.text).toBe('Start');
        expect(snapshot.outstanding).toBe(2);

        snapshot.release(start);
        expect(snapshot.outstanding).toBe(1);
      });
    });

    it('releases extra matches when only the first is wanted', async () => {
      await access.withSnapshot(async snapshot => {
        const matches = snapshot.query({ kind: 'text', text: 'e' }, { first: true });
        expect(matches.map(node => node.text)).toEqual(['Cancel']);
        expect(snapshot.outstanding).toBe(2);
      });
    });

    it('walks breadth-first for structural matches and releases what it skips', async () => {
      await access.withSnapshot(async snapshot => {
        const buttons = snapshot.query({ kind: 'structural', classNameContains: 'Button', clickable: true });

        expect(buttons.map(node => node.text)).toEqual(['Cancel', 'Start']);
        // root plus the two matches
        expect(snapshot.outstanding).toBe(3);
      });
      expect(platform.stats().outstanding).toBe(0);
    });

    it('stops at the first bounds match', async () => {
      await access.withSnapshot(async snapshot => {
        const node = snapshot.queryFirst({ kind: 'bounds', bounds: { left: 0, top: 60, right: 100, bottom: 110 } });

        expect(node?.text).toBe('Help');
        expect(snapshot.outstanding).toBe(2);
      });
    });

    it('never matches the root itself in structural queries', async () => {
      await access.withSnapshot(async snapshot => {
        expect(snapshot.query({ kind: 'structural', classNameContains: 'FrameLayout' })).toEqual([]);
        expect(snapshot.outstanding).toBe(1);
      });
    });
  });

  describe('release discipline', () => {
    it('makes release idempotent', async () => {
      await access.withSnapshot(async snapshot => {
        const parent = snapshot.childAt(snapshot.root, 0);
        snapshot.release(parent);
        snapshot.release(parent);
        snapshot.release(null);
      });

      expect(platform.stats()).toEqual({ issued: 2, recycled: 2, outstanding: 0 });
    });

    it('releases every outstanding handle, the root included, on close', async () => {
      await access.withSnapshot(async snapshot => {
        const row = snapshot.childAt(snapshot.root, 0);
        if (row) {
          snapshot.childAt(row, 0);
          snapshot.parentOf(row);
        }
        expect(platform.stats().outstanding).toBe(4);
      });

      expect(platform.stats().outstanding).toBe(0);
      expect(access.hasLiveSnapshot).toBe(false);
    });

    it('releases everything when the scoped body throws', async () => {
      await expect(
        access.withSnapshot(async snapshot => {
          snapshot.query({ kind: 'identifier', id: 'android:id/button2' });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(platform.stats().outstanding).toBe(0);
      expect(access.hasLiveSnapshot).toBe(false);
    });

    it('rejects use after close', async () => {
      const snapshot = await access.acquireSnapshot();
      if (!snapshot) throw new Error('no snapshot');
      snapshot.close();

      expect(snapshot.isClosed).toBe(true);
      expect(() => snapshot.query({ kind: 'text', text: 'Start' })).toThrow(StaleNodeError);
      expect(() => snapshot.close()).not.toThrow();
    });

    it('resolves to null and acquires nothing without a window', async () => {
      const empty = new NodeAccessLayer(new TreeUiPlatform(async () => null, new ScriptedDriver()));
      const body = jest.fn(async () => 'ran');

      await expect(empty.withSnapshot(body)).resolves.toBeNull();
      expect(body).not.toHaveBeenCalled();
    });
  });
});
