import { MotorCommands } from '../src/motor/MotorCommands';
import { describeDeviceError, encoderToPercent, isHardwareErrorCode, percentToEncoder } from '../src/motor/MotorConstants';
import { ValidationError } from '../src/utils/errors';

describe('MotorCommands', () => {
  test('builds MOVE with position and delay', () => {
    expect(MotorCommands.move(75, 5)).toEqual({ name: 'MOVE', params: { pos: 75, delay: 5 }, expectsResponse: true });
    expect(MotorCommands.move(0).params).toEqual({ pos: 0, delay: 0 });
  });

  test('MOVE bounds are inclusive', () => {
    expect(() => MotorCommands.move(100, 30)).not.toThrow();
    expect(() => MotorCommands.move(101)).toThrow(ValidationError);
    expect(() => MotorCommands.move(-1)).toThrow(ValidationError);
    expect(() => MotorCommands.move(50, 31)).toThrow(ValidationError);
  });

  test('rejects non-integers', () => {
    expect(() => MotorCommands.move(50.5)).toThrow(ValidationError);
    expect(() => MotorCommands.move(Number.NaN)).toThrow(ValidationError);
    expect(() => MotorCommands.jog(1.5)).toThrow(ValidationError);
  });

  test('validation error names the field and range', () => {
    try {
      MotorCommands.absoluteMove(70000);
      throw new Error('expected a ValidationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({
        field: 'position',
        value: 70000,
        min: 0,
        max: 65536,
        message: 'position must be an integer between 0 and 65536, got 70000'
      });
    }
  });

  test('builds A_MOVE up to the full encoder range', () => {
    expect(MotorCommands.absoluteMove(65536, 10000).params).toEqual({ pos: 65536, delay: 10000 });
    expect(() => MotorCommands.absoluteMove(100, 10001)).toThrow(ValidationError);
  });

  test('builds JOG with count 1-10', () => {
    expect(MotorCommands.jog().params).toEqual({ count: 1 });
    expect(MotorCommands.jog(10).params).toEqual({ count: 10 });
    expect(() => MotorCommands.jog(0)).toThrow(ValidationError);
    expect(() => MotorCommands.jog(11)).toThrow(ValidationError);
  });

  test('parameterless commands', () => {
    expect(MotorCommands.stop()).toEqual({ name: 'STOP', params: {}, expectsResponse: true });
    expect(MotorCommands.getStatus().name).toBe('GET_STATUS');
    expect(MotorCommands.getInfo().name).toBe('GET_INFO');
  });

  test('built commands are frozen', () => {
    const cmd = MotorCommands.move(10);
    expect(Object.isFrozen(cmd)).toBe(true);
    expect(Object.isFrozen(cmd.params)).toBe(true);
  });

  test('raw commands need a name', () => {
    expect(MotorCommands.raw('CALIBRATE', { step: 1 }, false))
      .toEqual({ name: 'CALIBRATE', params: { step: 1 }, expectsResponse: false });
    expect(() => MotorCommands.raw('  ')).toThrow(ValidationError);
  });
});

describe('MotorConstants', () => {
  test('describes documented device error codes', () => {
    expect(describeDeviceError(102)).toBe('Motor busy');
    expect(describeDeviceError('304')).toBe('Encoder error');
    expect(describeDeviceError(999)).toBe('Unknown error');
  });

  test('hardware error class is 3xx', () => {
    expect(isHardwareErrorCode(300)).toBe(true);
    expect(isHardwareErrorCode('301')).toBe(true);
    expect(isHardwareErrorCode(101)).toBe(false);
  });

  test('encoder and percent conversions', () => {
    expect(encoderToPercent(500, 1000)).toBe(50);
    expect(encoderToPercent(1200, 1000)).toBe(100);
    expect(encoderToPercent(10, 0)).toBeNull();
    expect(percentToEncoder(25, 1000)).toBe(250);
    expect(percentToEncoder(150, 1000)).toBe(1000);
  });
});
