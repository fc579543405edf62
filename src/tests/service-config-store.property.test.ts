/**
 * Property-Based Tests for Service Configuration Persistence
 *
 * **Feature: fiscal-service, Property 5: Configured Printers Round-Trip**
 *
 * For any printer id → URI mapping, replacing the configured printers and
 * loading them back yields the same mapping. Payment type remaps are stored
 * per lower-cased serial number and keep `null` (disabled) tokens.
 */

import * as fc from 'fast-check';
import Database from 'better-sqlite3';
import './propertyTestConfig';
import { PaymentType } from '../shared/types/fiscal';
import { ServiceConfigStore } from '../main/fiscal/services/ServiceConfigStore';
import { checkServiceTablesExist } from '../main/fiscal/services/ServiceDatabaseSchema';

// ============================================================================
// Test Database Setup
// ============================================================================

let db: Database.Database;
let store: ServiceConfigStore;

beforeEach(() => {
  db = new Database(':memory:');
  store = new ServiceConfigStore(db);
  store.initialize();
});

afterEach(() => {
  db.close();
});

const printerIdArb = fc.stringMatching(/^[a-z][a-z0-9_]{0,11}$/);
const uriArb = fc.oneof(
  fc.integer({ min: 0, max: 9 }).map((port) => `zfp.com:///dev/ttyS${port}`),
  fc.integer({ min: 1, max: 254 }).map((host) => `isl.tcp://10.0.0.${host}:9100`)
);
const printersArb = fc.dictionary(printerIdArb, uriArb.map((uri) => ({ uri })), { maxKeys: 6 });

// ============================================================================
// Property Tests
// ============================================================================

describe('Service Config Store Property Tests', () => {
  it('replacing configured printers round-trips the mapping', () => {
    fc.assert(
      fc.property(printersArb, printersArb, (first, second) => {
        store.replaceConfiguredPrinters(first);
        expect(store.getConfiguredPrinters()).toEqual(first);

        store.replaceConfiguredPrinters(second);
        expect(store.getConfiguredPrinters()).toEqual(second);
      })
    );
  });

  it('payment type remaps round-trip per device', () => {
    const tokenArb = fc.option(fc.stringMatching(/^[0-9A-Z]$/), { nil: null });
    fc.assert(
      fc.property(fc.constantFrom(...Object.values(PaymentType)), tokenArb, (paymentType, token) => {
        store.setPaymentTypeRemap('ZK000001', paymentType, token);

        expect(store.getPaymentTypeRemap('zk000001')[paymentType]).toBe(token);
        expect(store.getPaymentTypeRemap('DT000001')).toEqual({});
      })
    );
  });
});

// ============================================================================
// Unit Tests
// ============================================================================

describe('Service Config Store Unit Tests', () => {
  it('creates its tables on initialize', () => {
    expect(checkServiceTablesExist(db)).toEqual({
      serviceSettings: true,
      configuredPrinters: true,
      paymentTypeRemaps: true,
    });
  });

  it('generates the server id once', () => {
    const serverId = store.getServerId();

    expect(serverId).toMatch(/^[A-Za-z0-9_-]{22}$/);
    expect(store.getServerId()).toBe(serverId);
    expect(new ServiceConfigStore(db).getServerId()).toBe(serverId);
  });

  it('auto-detect falls back to the configured default until set', () => {
    expect(store.getAutoDetect()).toBe(true);
    expect(new ServiceConfigStore(db, false).getAutoDetect()).toBe(false);

    store.setAutoDetect(false);
    expect(store.getAutoDetect()).toBe(false);
  });

  it('operator defaults merge over the driver defaults', () => {
    expect(store.getOperatorDefaults()).toEqual({
      operatorId: '1',
      operatorPassword: '0000',
      operatorName: 'Operator',
    });

    store.setOperatorDefaults({ operatorName: 'Maria', operatorPassword: 'test-pass' });
    expect(store.getOperatorDefaults()).toEqual({
      operatorId: '1',
      operatorPassword: 'test-pass',
      operatorName: 'Maria',
    });
  });

  it('saving a configured printer twice updates its URI', () => {
    store.saveConfiguredPrinter({ id: 'front', uri: 'zfp.com:///dev/ttyS0' });
    store.saveConfiguredPrinter({ id: 'front', uri: 'zfp.com:///dev/ttyS1' });

    expect(store.getConfiguredPrinters()).toEqual({ front: { uri: 'zfp.com:///dev/ttyS1' } });
  });

  it('deleting reports whether the printer existed', () => {
    store.saveConfiguredPrinter({ id: 'front', uri: 'zfp.com:///dev/ttyS0' });

    expect(store.deleteConfiguredPrinter('front')).toBe(true);
    expect(store.deleteConfiguredPrinter('front')).toBe(false);
    expect(store.getConfiguredPrinters()).toEqual({});
  });

  it('driver settings combine operator defaults and the device remap', () => {
    store.setOperatorDefaults({ operatorId: '3' });
    store.setPaymentTypeRemap('zk000001', PaymentType.CARD, '9');
    store.setPaymentTypeRemap('zk000001', PaymentType.CHECK, null);

    expect(store.getDriverSettings('ZK000001')).toEqual({
      operatorId: '3',
      operatorPassword: '0000',
      operatorName: 'Operator',
      paymentTypeRemap: { [PaymentType.CARD]: '9', [PaymentType.CHECK]: null },
    });
  });

  it('clearing a remap restores the vendor token', () => {
    store.setPaymentTypeRemap('ZK000001', PaymentType.CARD, '9');

    expect(store.clearPaymentTypeRemap('ZK000001', PaymentType.CARD)).toBe(true);
    expect(store.clearPaymentTypeRemap('ZK000001', PaymentType.CARD)).toBe(false);
    expect(store.getPaymentTypeRemap('ZK000001')).toEqual({});
  });
});
