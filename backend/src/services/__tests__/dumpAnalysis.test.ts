import { loadUiVariants } from '../../config/uiVariants';
import { analyzeDump } from '../detector/dumpAnalysis';
import { readFixture } from '../../../tests/helpers/fixtures';

describe('analyzeDump', () => {
  const variants = loadUiVariants();

  it('classifies every shape and locates every role', async () => {
    const analysis = await analyzeDump(readFixture('share-chooser'), variants);

    expect(analysis.nodeCount).toBe(7);
    expect(analysis.reports.map(report => report.shape)).toEqual([
      'incoming-connection',
      'share-dialog',
      'share-chooser',
      'share-confirm'
    ]);
    expect(analysis.reports.filter(report => report.confirmed).map(report => [report.shape, report.score])).toEqual([
      ['share-chooser', 5]
    ]);
    expect(analysis.roles.filter(role => role.found)).toEqual([
      { role: 'entire-screen-option', found: true, strategy: 'text', caption: null, className: 'android.widget.LinearLayout' }
    ]);
    expect(analysis.handles.outstanding).toBe(0);
  });

  it('reports an empty dump without a window', async () => {
    const analysis = await analyzeDump(readFixture('empty'), variants);

    expect(analysis).toEqual({
      nodeCount: 0,
      reports: [],
      roles: [],
      handles: { issued: 0, recycled: 0, outstanding: 0 }
    });
  });
});
