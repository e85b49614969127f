import { describe, test, expect, vi } from 'vitest';
import { drawQuadTree, describeQuadTree, DebugDrawTarget } from './debug-draw';
import { QuadTree } from './quad-tree';
import { QuadTreeEntry } from './quad-tree-entry';
import { rectangle } from './shapes';

function buildSplitWorld(): QuadTree {
  const root = new QuadTree(rectangle(0, 0, 100, 100), { maxObjectsPerNode: 2, maxDepth: 3 });
  root.insert(new QuadTreeEntry({ bounds: rectangle(10, 10, 5, 5) }));
  root.insert(new QuadTreeEntry({ bounds: rectangle(20, 20, 5, 5) }));
  root.insert(new QuadTreeEntry({ bounds: rectangle(90, 90, 5, 5) }));
  return root;
}

function mockTarget() {
  const target = {
    strokeRect: vi.fn<DebugDrawTarget['strokeRect']>(),
    fillText: vi.fn<DebugDrawTarget['fillText']>(),
  };
  return target;
}

describe('drawQuadTree', () => {
  test('outlines every node and labels leaves with their counts', () => {
    const target = mockTarget();

    drawQuadTree(buildSplitWorld(), target);

    expect(target.strokeRect.mock.calls).toEqual([
      [0, 0, 100, 100],
      [0, 0, 50, 50],
      [50, 0, 50, 50],
      [50, 50, 50, 50],
      [0, 50, 50, 50],
    ]);
    expect(target.fillText.mock.calls).toEqual([
      ['2', 25, 25],
      ['0', 75, 25],
      ['1', 75, 75],
      ['0', 25, 75],
    ]);
  });

  test('can label internal nodes', () => {
    const target = mockTarget();

    drawQuadTree(buildSplitWorld(), target, { includeInternalCounts: true });

    expect(target.fillText).toHaveBeenCalledTimes(5);
    expect(target.fillText.mock.calls[0]).toEqual(['3', 50, 50]);
  });
});

describe('describeQuadTree', () => {
  test('prints one indented line per node', () => {
    expect(describeQuadTree(buildSplitWorld())).toBe([
      'node (0,0,100,100) count=3',
      '  leaf (0,0,50,50) count=2',
      '  leaf (50,0,50,50) count=0',
      '  leaf (50,50,50,50) count=1',
      '  leaf (0,50,50,50) count=0',
    ].join('\n'));
  });
});
