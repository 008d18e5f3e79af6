import type { ShotTelemetry } from '@shot-relay/shared';
import { describe, expect, it } from 'vitest';
import {
  DeviceMessageAssembler,
  formatDeviceStatus,
  formatShotReading,
  parseBallPosition,
  parseDeviceMessage,
  validateShotReading,
} from '../src/device.js';

const telemetry: ShotTelemetry = {
  speedMph: 165.5,
  launchAngleDeg: 11.25,
  azimuthDeg: -1.5,
  totalSpinRpm: 2650.4,
  backSpinRpm: 2500,
  sideSpinRpm: -300,
};

describe('formatShotReading', () => {
  it('should omit spin components from an early reading', () => {
    const message = formatShotReading(3, telemetry, {
      msecSinceContact: 200,
      includeSpinComponents: false,
    });

    expect(message).toBe(
      [
        '0H',
        'SHOT_ID=3',
        'TIME_SEC=0',
        'MSEC_SINCE_CONTACT=200',
        'SPEED_MPH=165.50',
        'AZIMUTH_DEG=-1.50',
        'ELEVATION_DEG=11.25',
        'SPIN_RPM=2650',
        'IS_LEFT=0',
        'WORLDSTART_X=-53.53',
        'WORLDSTART_Y=91.40',
        'WORLDSTART_Z=-477.94',
        'HMT=0',
      ].join('\n') + '\n\t'
    );
  });

  it('should add back and side spin to a final reading', () => {
    const message = formatShotReading(3, telemetry, {
      msecSinceContact: 1000,
      includeSpinComponents: true,
    });

    expect(message).toContain('\nMSEC_SINCE_CONTACT=1000\n');
    expect(message).toContain('\nSPIN_RPM=2650\nBACK_RPM=2500\nSIDE_RPM=-300\nIS_LEFT=0\n');
  });

  it('should append the club block when club data is present', () => {
    const message = formatShotReading(
      7,
      { ...telemetry, club: { speedMph: 112.3, pathDeg: 2.4, attackAngleDeg: -1.2 } },
      { msecSinceContact: 1000, includeSpinComponents: true }
    );

    expect(message.endsWith('\nHMT=1\nCLUBSPEED_MPH=112.3\nHPATH_DEG=2.4\nVPATH_DEG=-1.2\n\t')).toBe(
      true
    );
  });
});

describe('formatDeviceStatus', () => {
  it('should report a ready device with a ball on the tee', () => {
    expect(formatDeviceStatus({ isReady: true, ballDetected: true })).toBe(
      '0M\nFLAGS=7\nBALLS=1\nBALL1=198,206,12\n\t'
    );
  });

  it('should omit the ball position when no ball is present', () => {
    expect(formatDeviceStatus({ isReady: false, ballDetected: false })).toBe(
      '0M\nFLAGS=1\nBALLS=0\n\t'
    );
  });
});

describe('parseDeviceMessage', () => {
  it('should parse a final reading', () => {
    const message = formatShotReading(3, telemetry, {
      msecSinceContact: 1000,
      includeSpinComponents: true,
    });

    expect(parseDeviceMessage(message)).toEqual({
      type: 'shot',
      reading: {
        shotId: 3,
        msecSinceContact: 1000,
        isFinal: true,
        telemetry: {
          speedMph: 165.5,
          launchAngleDeg: 11.25,
          azimuthDeg: -1.5,
          totalSpinRpm: 2650,
          backSpinRpm: 2500,
          sideSpinRpm: -300,
        },
        worldStart: { x: -53.53, y: 91.4, z: -477.94 },
      },
    });
  });

  it('should mark an early reading as not final', () => {
    const message = formatShotReading(3, telemetry, {
      msecSinceContact: 200,
      includeSpinComponents: false,
    });

    const parsed = parseDeviceMessage(message);

    expect(parsed?.type).toBe('shot');
    if (parsed?.type === 'shot') {
      expect(parsed.reading.isFinal).toBe(false);
      expect(parsed.reading.msecSinceContact).toBe(200);
      expect(parsed.reading.telemetry.backSpinRpm).toBe(0);
      expect(parsed.reading.telemetry.sideSpinRpm).toBe(0);
    }
  });

  it('should parse club data from an HMT block', () => {
    const parsed = parseDeviceMessage(
      '0H\nSHOT_ID=1\nSPEED_MPH=120.00\nHMT=1\nCLUBSPEED_MPH=88.5\nFACE_T_DEG=-0.5'
    );

    expect(parsed?.type).toBe('shot');
    if (parsed?.type === 'shot') {
      expect(parsed.reading.telemetry.club).toEqual({ speedMph: 88.5, faceToTargetDeg: -0.5 });
    }
  });

  it('should parse device status', () => {
    expect(parseDeviceMessage('0M\nFLAGS=7\nBALLS=1\nBALL1=198,206,12')).toEqual({
      type: 'status',
      status: {
        flags: 7,
        balls: 1,
        isReady: true,
        ballDetected: true,
        ballPosition: { x: 198, y: 206, z: 12 },
      },
    });
  });

  it('should tolerate a leading tab left by the previous terminator', () => {
    const parsed = parseDeviceMessage('\t0M\nFLAGS=1\nBALLS=0');

    expect(parsed).toEqual({
      type: 'status',
      status: { flags: 1, balls: 0, isReady: false, ballDetected: false, ballPosition: null },
    });
  });

  it('should reject unknown kinds and missing required fields', () => {
    expect(parseDeviceMessage('0X\nFLAGS=7')).toBeNull();
    expect(parseDeviceMessage('0M\nBALLS=1')).toBeNull();
    expect(parseDeviceMessage('0H\nSHOT_ID=1')).toBeNull();
    expect(parseDeviceMessage('')).toBeNull();
  });
});

describe('parseBallPosition', () => {
  it('should parse three comma-separated numbers', () => {
    expect(parseBallPosition(' 1.5, 2 ,3')).toEqual({ x: 1.5, y: 2, z: 3 });
  });

  it('should reject anything else', () => {
    expect(parseBallPosition('1,2')).toBeNull();
    expect(parseBallPosition('1,,3')).toBeNull();
    expect(parseBallPosition('a,b,c')).toBeNull();
  });
});

describe('validateShotReading', () => {
  const valid: ShotTelemetry = {
    speedMph: 150,
    launchAngleDeg: 12,
    azimuthDeg: 1,
    totalSpinRpm: 2700,
    backSpinRpm: 2600,
    sideSpinRpm: 100,
  };

  it('should accept a plausible shot', () => {
    expect(validateShotReading(valid)).toBeNull();
  });

  it('should reject implausible readings', () => {
    expect(validateShotReading({ ...valid, speedMph: 5 })).toBe('ball speed 5 mph outside 10-250');
    expect(validateShotReading({ ...valid, launchAngleDeg: 61 })).toBe(
      'launch angle 61 deg outside -10-60'
    );
    expect(validateShotReading({ ...valid, azimuthDeg: -46 })).toBe('direction -46 deg beyond 45');
    expect(validateShotReading({ ...valid, totalSpinRpm: 0 })).toBe('zero spin (misread)');
    expect(validateShotReading({ ...valid, backSpinRpm: 2222 })).toBe(
      'back spin 2222 (misread code)'
    );
    expect(validateShotReading({ ...valid, totalSpinRpm: 50 })).toBe(
      'spin 50 rpm too low for 150 mph'
    );
  });

  it('should accept low spin on a slow shot', () => {
    expect(validateShotReading({ ...valid, speedMph: 40, totalSpinRpm: 50 })).toBeNull();
  });
});

describe('DeviceMessageAssembler', () => {
  it('should emit a message only once its terminator arrives', () => {
    const assembler = new DeviceMessageAssembler();
    const wire = formatDeviceStatus({ isReady: true, ballDetected: true });
    const received: string[] = [];

    for (let offset = 0; offset < wire.length; offset += 5) {
      received.push(...assembler.push(wire.slice(offset, offset + 5)));
    }

    expect(received).toEqual(['0M\nFLAGS=7\nBALLS=1\nBALL1=198,206,12']);
    expect(assembler.pending).toBe('');
  });

  it('should handle a terminator split across packets', () => {
    const assembler = new DeviceMessageAssembler();

    expect(assembler.push('0M\nFLAGS=1\nBALLS=0\n')).toEqual([]);
    expect(assembler.push('\t0M\nFLAGS=7')).toEqual(['0M\nFLAGS=1\nBALLS=0']);
    expect(assembler.pending).toBe('0M\nFLAGS=7');
  });

  it('should return several messages completed by one packet', () => {
    const assembler = new DeviceMessageAssembler();

    expect(assembler.push('0M\nFLAGS=1\n\t0M\nFLAGS=7\n\t')).toEqual([
      '0M\nFLAGS=1',
      '0M\nFLAGS=7',
    ]);
  });

  it('should hold back a multi-byte character split between packets', () => {
    const assembler = new DeviceMessageAssembler();
    const bytes = Buffer.from('0M\nNOTE=12°\n\t', 'utf8');
    const split = bytes.indexOf(0xc2) + 1;

    expect(assembler.push(bytes.subarray(0, split))).toEqual([]);
    expect(assembler.push(bytes.subarray(split))).toEqual(['0M\nNOTE=12°']);
  });

  it('should drop a partial message on reset', () => {
    const assembler = new DeviceMessageAssembler();

    assembler.push('0H\nSHOT_ID=1');
    assembler.reset();

    expect(assembler.pending).toBe('');
  });
});
