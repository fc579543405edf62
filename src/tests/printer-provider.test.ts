/**
 * Printer URI parsing, connection and serial port auto-detection against an
 * in-process device bus.
 */

import { FiscalPrinterProvider, formatPrinterUri, parsePrinterUri } from '../main/fiscal/provider/FiscalPrinterProvider';
import { ZfpDriver } from '../main/fiscal/drivers/ZfpDriver';
import { IslDriver } from '../main/fiscal/drivers/IslDriver';
import { FiscalProtocol, FiscalTransportType, PaymentType } from '../shared/types/fiscal';
import { isFiscalError } from '../shared/utils/error-handler';
import { FakeDeviceBus, FakeIslDevice, FakeZfpDevice } from './support/fake-devices';

function codeOf(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    return isFiscalError(error) ? error.code : undefined;
  }
  return undefined;
}

// ============================================================================
// Printer URIs
// ============================================================================

describe('Printer URIs', () => {
  it('parses protocol, transport, address and baud rate', () => {
    expect(parsePrinterUri('zfp.com:///dev/ttyUSB0?baudRate=115200')).toEqual({
      protocol: FiscalProtocol.ZFP,
      transport: FiscalTransportType.SERIAL,
      address: '/dev/ttyUSB0',
      baudRate: 115200,
    });
    expect(parsePrinterUri(' isl.tcp://10.0.0.5:9100 ')).toEqual({
      protocol: FiscalProtocol.ISL,
      transport: FiscalTransportType.TCP,
      address: '10.0.0.5:9100',
    });
  });

  it('formats back to the canonical form', () => {
    expect(formatPrinterUri(parsePrinterUri('isl.com://COM3'))).toBe('isl.com://COM3');
    expect(formatPrinterUri(parsePrinterUri('zfp.com:///dev/ttyS0?baudRate=9600'))).toBe(
      'zfp.com:///dev/ttyS0?baudRate=9600'
    );
  });

  it('rejects unknown schemes and bad baud rates', () => {
    expect(() => parsePrinterUri('escpos.tcp://10.0.0.5')).toThrow('Invalid printer URI: escpos.tcp://10.0.0.5');
    expect(() => parsePrinterUri('zfp.com:///dev/ttyS0?baudRate=fast')).toThrow(
      'Invalid baud rate in printer URI: zfp.com:///dev/ttyS0?baudRate=fast'
    );
    expect(codeOf(() => parsePrinterUri('zfp.usb://x'))).toBe('E403');
  });
});

// ============================================================================
// Connecting
// ============================================================================

describe('FiscalPrinterProvider', () => {
  let bus: FakeDeviceBus;
  let zfp: FakeZfpDevice;
  let isl: FakeIslDevice;
  let provider: FiscalPrinterProvider;

  beforeEach(() => {
    bus = new FakeDeviceBus();
    zfp = bus.attach(new FakeZfpDevice('/dev/ttyFAKE0'));
    isl = bus.attach(new FakeIslDevice('/dev/ttyFAKE1'));
    provider = new FiscalPrinterProvider({
      commandTimeout: 500,
      probeTimeout: 30,
      channelFactory: bus.channelFactory,
      listPorts: bus.listPorts,
      resolveSettings: (serialNumber) =>
        serialNumber === 'ZK000001' ? { paymentTypeRemap: { [PaymentType.CARD]: '9' } } : {},
    });
  });

  afterEach(async () => {
    await zfp.close();
    await isl.close();
  });

  it('binds the driver of the URI protocol and reads the device info', async () => {
    const driver = await provider.connect('zfp.com:///dev/ttyFAKE0');

    expect(driver).toBeInstanceOf(ZfpDriver);
    expect(driver.info).toMatchObject({
      uri: 'zfp.com:///dev/ttyFAKE0',
      serialNumber: 'ZK000001',
      fiscalMemorySerialNumber: '50000001',
      manufacturer: 'Tremol',
      model: 'FP-01-KL',
      firmwareVersion: '1.01',
      itemTextMaxLength: 34,
      commentTextMaxLength: 46,
    });
  });

  it('applies the settings resolved for the device serial number', async () => {
    const driver = await provider.connect('zfp.com:///dev/ttyFAKE0');
    expect(driver).toBeInstanceOf(ZfpDriver);
    if (driver instanceof ZfpDriver) {
      expect(driver.getPaymentTypeText(PaymentType.CARD)).toEqual({ ok: true, value: '9' });
    }
  });

  it('reads ISL identification from the diagnostic info', async () => {
    const driver = await provider.connect('isl.com:///dev/ttyFAKE1');

    expect(driver).toBeInstanceOf(IslDriver);
    expect(driver.info).toMatchObject({
      serialNumber: 'DT000001',
      fiscalMemorySerialNumber: '44000001',
      manufacturer: 'Eltrade',
      model: 'ZK-1',
      itemTextMaxLength: 30,
    });
  });

  it('fails when nothing is attached at the address', async () => {
    await expect(provider.connect('zfp.com:///dev/ttyNONE')).rejects.toMatchObject({ code: 'E101' });
  });

  it('fails and closes the channel when the device speaks another protocol', async () => {
    await expect(provider.connect('isl.com:///dev/ttyFAKE0')).rejects.toThrow(
      'Device at isl.com:///dev/ttyFAKE0 did not identify itself as ISL'
    );
  });

  it('detects one printer per answering port, trying each protocol', async () => {
    const printers = await provider.detectAvailablePrinters();

    expect(printers.map((p) => p.info.uri)).toEqual(['zfp.com:///dev/ttyFAKE0', 'isl.com:///dev/ttyFAKE1']);
    expect(bus.opened).toEqual(['zfp:/dev/ttyFAKE0', 'zfp:/dev/ttyFAKE1', 'isl:/dev/ttyFAKE1']);
  });
});
