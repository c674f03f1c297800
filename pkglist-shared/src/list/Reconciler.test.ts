import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EntryRegistry } from './EntryRegistry';
import { PackageItem } from './PackageItem';
import { Reconciler } from './Reconciler';
import type { PackageRegistry } from './Reconciler';
import { createChildLogger } from '../logging/logger';
import { PackageDatabase } from '../page/PackageDatabase';
import { makePackage, makePage, visualState } from '../testing/fixtures';
import type { PackageInfo } from '../types/package';

describe('Reconciler', () => {
  let registry: PackageRegistry;
  let database: PackageDatabase;
  let refresh: ReturnType<typeof vi.fn>;
  let reconciler: Reconciler;
  const log = createChildLogger('reconciler-test');

  const ids = () => registry.all().map(e => e.uniqueId);

  beforeEach(() => {
    registry = new EntryRegistry<PackageInfo, PackageItem>(pkg => new PackageItem(pkg));
    database = new PackageDatabase(['alpha', 'beta', 'gamma'].map(n => makePackage(n)));
    refresh = vi.fn();
    reconciler = new Reconciler(registry, database, refresh, log);
  });

  describe('onRebuild', () => {
    it('materializes entries in page order with their visual state', () => {
      reconciler.onRebuild(makePage([
        visualState('gamma'),
        visualState('alpha', false),
        visualState('beta', true, true),
      ]));

      expect(ids()).toEqual(['gamma', 'alpha', 'beta']);
      expect(registry.get('alpha')?.visible).toBe(false);
      expect(registry.get('beta')?.expanded).toBe(true);
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(refresh).toHaveBeenCalledWith(true);
    });

    it('skips states whose package cannot be resolved', () => {
      reconciler.onRebuild(makePage([visualState('alpha'), visualState('missing'), visualState('beta')]));

      expect(ids()).toEqual(['alpha', 'beta']);
    });

    it('gives the same result when repeated', () => {
      const page = makePage([visualState('beta'), visualState('alpha')]);
      reconciler.onRebuild(page);
      const first = ids();
      reconciler.onRebuild(page);

      expect(ids()).toEqual(first);
      expect(registry.size).toBe(2);
    });
  });

  describe('onUpdate', () => {
    beforeEach(() => {
      reconciler.onRebuild(makePage([visualState('alpha'), visualState('beta'), visualState('gamma')]));
      refresh.mockClear();
    });

    it('removes first, then upserts, appending new identities', () => {
      const delta = makePackage('delta');
      const page = makePage([visualState('beta'), visualState('gamma'), visualState('delta')]);

      reconciler.onUpdate({
        page,
        removed: [makePackage('alpha')],
        addedOrUpdated: [delta],
        reorder: false,
      });

      expect(ids()).toEqual(['beta', 'gamma', 'delta']);
      expect(registry.get('delta')?.visible).toBe(true);
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(refresh).toHaveBeenCalledWith(true);
    });

    it('keeps the registry order for attribute-only updates', () => {
      const betaItem = registry.get('beta');
      const renamed = makePackage('beta', { displayName: 'Beta Renamed' });

      reconciler.onUpdate({
        page: makePage([visualState('beta'), visualState('alpha'), visualState('gamma')]),
        addedOrUpdated: [renamed],
        reorder: false,
      });

      expect(ids()).toEqual(['alpha', 'beta', 'gamma']);
      expect(registry.get('beta')).toBe(betaItem);
      expect(registry.get('beta')?.package.displayName).toBe('Beta Renamed');
      expect(refresh).not.toHaveBeenCalled();
    });

    it('reorders from the page when asked, without a scroll recompute on same size', () => {
      reconciler.onUpdate({
        page: makePage([visualState('gamma'), visualState('alpha'), visualState('beta')]),
        reorder: true,
      });

      expect(ids()).toEqual(['gamma', 'alpha', 'beta']);
      expect(refresh).not.toHaveBeenCalled();
    });

    it('skips page ids with no entry while reordering', () => {
      reconciler.onUpdate({
        page: makePage([visualState('beta'), visualState('ghost'), visualState('alpha'), visualState('gamma')]),
        reorder: true,
      });

      expect(ids()).toEqual(['beta', 'alpha', 'gamma']);
    });

    it('ignores removals of unknown identities', () => {
      reconciler.onUpdate({
        page: makePage([visualState('alpha'), visualState('beta'), visualState('gamma')]),
        removed: [makePackage('nobody')],
        reorder: false,
      });

      expect(registry.size).toBe(3);
      expect(refresh).not.toHaveBeenCalled();
    });
  });

  describe('onVisualStateChange', () => {
    beforeEach(() => {
      reconciler.onRebuild(makePage([visualState('alpha'), visualState('beta')]));
      refresh.mockClear();
    });

    it('applies states to existing entries only', () => {
      reconciler.onVisualStateChange([visualState('beta', false), visualState('zeta', false)]);

      expect(registry.get('beta')?.visible).toBe(false);
      expect(registry.has('zeta')).toBe(false);
      expect(refresh).toHaveBeenCalledWith(true);
    });

    it('does nothing for an empty change set', () => {
      reconciler.onVisualStateChange([]);

      expect(refresh).not.toHaveBeenCalled();
    });
  });
});
