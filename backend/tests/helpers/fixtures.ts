import { readFileSync } from 'fs';
import path from 'path';
import type { UiTreeNode } from '../../src/types/uiTree';
import { parseUiHierarchy } from '../../src/utils/uiHierarchy';

const FIXTURE_DIR = path.resolve(__dirname, '..', 'fixtures');

export type FixtureName =
  | 'incoming-connection'
  | 'connection-closed'
  | 'share-dialog'
  | 'share-dialog-chooser-open'
  | 'share-chooser'
  | 'share-confirm'
  | 'launcher'
  | 'empty';

export const fixturePath = (name: FixtureName): string => path.join(FIXTURE_DIR, `${name}.xml`);

export const readFixture = (name: FixtureName): string => readFileSync(fixturePath(name), 'utf-8');

export const loadFixtureTree = (name: FixtureName): UiTreeNode | null => parseUiHierarchy(readFixture(name));

/**
 * Window tree the platform serves; tests swap it to simulate the device
 * moving between screens
 */
export class ScreenSource {
  current: UiTreeNode | null = null;

  show(name: FixtureName | null): void {
    this.current = name === null ? null : loadFixtureTree(name);
  }

  readonly source = async (): Promise<UiTreeNode | null> => this.current;
}
