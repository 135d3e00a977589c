import {
  StatusType,
  isReservedStatusCode,
  isStatusType,
  statusTypeFromCode,
  statusTypeName,
} from '../src/StatusType';

describe('StatusType', () => {
  it('defines the registered values', () => {
    expect(StatusType.VALID).toBe(0x00);
    expect(StatusType.INVALID).toBe(0x01);
    expect(StatusType.SUSPENDED).toBe(0x02);
  });

  it('defines the application-specific values', () => {
    expect(StatusType.APPLICATION_SPECIFIC_3).toBe(0x03);
    expect(StatusType.APPLICATION_SPECIFIC_11).toBe(0x0b);
    expect(StatusType.APPLICATION_SPECIFIC_12).toBe(0x0c);
    expect(StatusType.APPLICATION_SPECIFIC_13).toBe(0x0d);
    expect(StatusType.APPLICATION_SPECIFIC_14).toBe(0x0e);
    expect(StatusType.APPLICATION_SPECIFIC_15).toBe(0x0f);
  });

  describe('statusTypeFromCode', () => {
    it('maps named codes', () => {
      expect(statusTypeFromCode(0x02)).toBe(StatusType.SUSPENDED);
      expect(statusTypeFromCode(0x0f)).toBe(StatusType.APPLICATION_SPECIFIC_15);
    });

    it('returns undefined for reserved and unnamed codes', () => {
      for (let code = 0x04; code <= 0x0a; code++) {
        expect(statusTypeFromCode(code)).toBeUndefined();
      }
      expect(statusTypeFromCode(0x10)).toBeUndefined();
      expect(statusTypeFromCode(0xff)).toBeUndefined();
    });
  });

  describe('isStatusType', () => {
    it('narrows named codes only', () => {
      expect(isStatusType(0)).toBe(true);
      expect(isStatusType(0x0b)).toBe(true);
      expect(isStatusType(0x04)).toBe(false);
    });
  });

  describe('statusTypeName', () => {
    it('returns the symbolic name', () => {
      expect(statusTypeName(0)).toBe('VALID');
      expect(statusTypeName(1)).toBe('INVALID');
      expect(statusTypeName(0x0c)).toBe('APPLICATION_SPECIFIC_12');
      expect(statusTypeName(0x10)).toBeUndefined();
    });
  });

  describe('isReservedStatusCode', () => {
    it('covers 0x04 through 0x0a', () => {
      expect(isReservedStatusCode(0x03)).toBe(false);
      expect(isReservedStatusCode(0x04)).toBe(true);
      expect(isReservedStatusCode(0x0a)).toBe(true);
      expect(isReservedStatusCode(0x0b)).toBe(false);
    });
  });
});
