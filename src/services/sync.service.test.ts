import 'reflect-metadata';
import { ICarrierApiClient } from '../adapters/carrier/carrier-client.interface';
import { SqlitePackageStore } from '../store/sqlite-package.store';
import { createTestStore } from '../test-support/fixtures';
import { CarrierTrackingInfo, PackageStatus, TrackingEvent } from '../types/domain.types';
import { DecodeError, NotFoundError, TransportError } from '../types/error.types';
import { createSilentLogger } from '../utils/logger';
import { SyncService } from './sync.service';

describe('SyncService', () => {
  let store: SqlitePackageStore;
  let mockCarrierClient: jest.Mocked<ICarrierApiClient>;
  let syncService: SyncService;

  const departed: TrackingEvent = {
    timestamp: '2024-03-01T10:00:00.000Z',
    location: 'Memphis',
    description: 'Departed facility'
  };
  const delivered: TrackingEvent = {
    timestamp: '2024-03-02T15:30:00.000Z',
    location: 'Austin',
    description: 'Delivered'
  };

  function carrierResponse(entries: Record<string, CarrierTrackingInfo>): Map<string, CarrierTrackingInfo> {
    return new Map(Object.entries(entries));
  }

  beforeEach(() => {
    ({ store } = createTestStore());
    mockCarrierClient = {
      query: jest.fn()
    };
    syncService = new SyncService(store, mockCarrierClient, createSilentLogger());
  });

  afterEach(() => {
    store.close();
  });

  describe('Full sync', () => {
    // Test: Numbers absent from the response are left untouched
    it('should update only the packages the carrier returned', async () => {
      // Arrange: three tracked, carrier knows two
      await store.add('A');
      await store.add('B');
      await store.add('C');
      await store.mergeUpdate('C', PackageStatus.IN_TRANSIT, [departed]);
      const before = await store.get('C');

      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        A: { status: PackageStatus.IN_TRANSIT, events: [departed] },
        B: { status: PackageStatus.DELIVERED, events: [departed, delivered] }
      }));

      // Act
      const result = await syncService.sync();

      // Assert
      expect(mockCarrierClient.query).toHaveBeenCalledTimes(1);
      expect(mockCarrierClient.query).toHaveBeenCalledWith(['C', 'B', 'A']);
      expect(result).toEqual({
        success: true,
        requested: 3,
        synced: 2,
        unchanged: ['C'],
        errors: [],
        message: 'Synced 2 of 3 packages'
      });
      expect((await store.get('A')).status).toBe(PackageStatus.IN_TRANSIT);
      expect((await store.get('B')).events).toEqual([delivered, departed]);
      expect(await store.get('C')).toEqual(before);
    });

    // Test: Re-running the same sync does not duplicate events
    it('should be idempotent across repeated syncs with identical carrier data', async () => {
      // Arrange
      await store.add('A');
      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        A: { status: PackageStatus.IN_TRANSIT, events: [departed] }
      }));

      // Act
      await syncService.sync();
      await syncService.sync();

      // Assert
      expect((await store.get('A')).events).toEqual([departed]);
    });

    // Test: Per-number failures are bookkept
    it('should record numbers that fail to merge without aborting the batch', async () => {
      // Arrange: B is deleted while the carrier call is in flight
      await store.add('A');
      await store.add('B');
      mockCarrierClient.query.mockImplementation(async () => {
        await store.delete('B');
        return carrierResponse({
          B: { status: PackageStatus.DELIVERED, events: [] },
          A: { status: PackageStatus.OUT_FOR_DELIVERY, events: [] }
        });
      });

      // Act
      const result = await syncService.sync();

      // Assert
      expect(result.synced).toBe(1);
      expect(result.errors).toEqual([
        { trackingNumber: 'B', errorType: 'NotFoundError', message: 'Package B not found' }
      ]);
      expect((await store.get('A')).status).toBe(PackageStatus.OUT_FOR_DELIVERY);
      await expect(store.get('B')).rejects.toBeInstanceOf(NotFoundError);
    });

    // Test: Data for numbers outside the run is ignored
    it('should ignore carrier data for numbers that are not tracked', async () => {
      await store.add('A');
      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        GHOST: { status: PackageStatus.DELIVERED, events: [] },
        A: { status: PackageStatus.OUT_FOR_DELIVERY, events: [] }
      }));

      const result = await syncService.sync();

      expect(result).toMatchObject({ requested: 1, synced: 1, unchanged: [], errors: [] });
      await expect(store.get('GHOST')).rejects.toBeInstanceOf(NotFoundError);
    });

    // Test: Terminal guard applies to sync
    it('should not regress a delivered package', async () => {
      // Arrange
      await store.add('A');
      await store.mergeUpdate('A', PackageStatus.DELIVERED, [delivered]);
      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        A: { status: PackageStatus.IN_TRANSIT, events: [departed] }
      }));

      // Act
      await syncService.sync();

      // Assert
      const details = await store.get('A');
      expect(details.status).toBe(PackageStatus.DELIVERED);
      expect(details.events).toEqual([delivered, departed]);
    });

    // Test: Empty store
    it('should not call the carrier when nothing is tracked', async () => {
      const result = await syncService.sync();

      expect(mockCarrierClient.query).not.toHaveBeenCalled();
      expect(result.requested).toBe(0);
      expect(result.message).toBe('No packages to sync');
    });
  });

  describe('Targeted sync', () => {
    // Test: Single number
    it('should query only the requested package', async () => {
      // Arrange
      await store.add('A');
      await store.add('B');
      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        A: { status: PackageStatus.IN_TRANSIT, events: [] }
      }));

      // Act
      const result = await syncService.sync('A');

      // Assert
      expect(mockCarrierClient.query).toHaveBeenCalledWith(['A']);
      expect(result.synced).toBe(1);
      expect((await store.get('B')).status).toBe(PackageStatus.PENDING);
    });

    // Test: Only the requested package is merged
    it('should leave other tracked packages alone when the carrier answers for them too', async () => {
      // Arrange
      await store.add('A');
      await store.add('B');
      mockCarrierClient.query.mockResolvedValue(carrierResponse({
        A: { status: PackageStatus.IN_TRANSIT, events: [] },
        B: { status: PackageStatus.DELIVERED, events: [delivered] }
      }));

      // Act
      const result = await syncService.sync('A');

      // Assert
      expect(result).toEqual({
        success: true,
        requested: 1,
        synced: 1,
        unchanged: [],
        errors: [],
        message: 'Synced 1 of 1 packages'
      });
      expect((await store.get('A')).status).toBe(PackageStatus.IN_TRANSIT);
      const untouched = await store.get('B');
      expect(untouched.status).toBe(PackageStatus.PENDING);
      expect(untouched.events).toEqual([]);
    });

    // Test: Unknown number
    it('should throw NotFoundError for an untracked number without calling the carrier', async () => {
      await expect(syncService.sync('MISSING')).rejects.toBeInstanceOf(NotFoundError);
      expect(mockCarrierClient.query).not.toHaveBeenCalled();
    });
  });

  describe('Carrier failures', () => {
    // Test: Transport failure aborts with zero mutation
    it('should propagate TransportError and leave the store untouched', async () => {
      // Arrange
      await store.add('A');
      const before = await store.get('A');
      mockCarrierClient.query.mockRejectedValue(new TransportError('HTTP 503: Service Unavailable', false, 503));

      // Act & Assert
      await expect(syncService.sync()).rejects.toBeInstanceOf(TransportError);
      expect(await store.get('A')).toEqual(before);
    });

    // Test: Decode failure aborts
    it('should propagate DecodeError', async () => {
      await store.add('A');
      mockCarrierClient.query.mockRejectedValue(new DecodeError('Carrier response failed validation'));

      await expect(syncService.sync()).rejects.toBeInstanceOf(DecodeError);
      expect((await store.get('A')).lastUpdate).toBeNull();
    });
  });
});
