import { MalformedMetadataError } from './errors.js';

/**
 * Time register layout (bytes 0-2 are not used):
 *
 * | byte | bits 7-4      | bits 3-0      |
 * |------|---------------|---------------|
 * | 3    | status        | days hundreds |
 * | 4    | days tens     | days units    |
 * | 5    | hours tens    | hours units   |
 * | 6    | minutes tens  | minutes units |
 * | 7    | seconds tens  | seconds units |
 * | 8    | 1e-1 s        | 1e-2 s        |
 * | 9    | 1e-3 s        | 1e-4 s        |
 * | 10   | 1e-5 s        | 1e-6 s        |
 * | 11   | 1e-7 s        | not defined   |
 */
export const BCD_REGISTER_SIZE = 12;

const SUBSECOND_DIGITS = 7;

export interface BcdTimestamp {
    days: number;
    hours: number;
    minutes: number;
    /** Seconds including the seven fractional digits. */
    seconds: number;
    status: number;
    /** Seconds elapsed since the epoch the register counts from. */
    epochSeconds: number;
    /** Millisecond-truncated calendar time. */
    date: Date;
    iso: string;
}

function digit(register: Uint8Array, byte: number, high: boolean, field: string): number {
    const value = high ? (register[byte] >> 4) & 0x0f : register[byte] & 0x0f;
    if (value > 9) {
        throw new MalformedMetadataError(
            `BCD digit ${field} in byte ${byte} is 0x${value.toString(16)}`,
            field,
            'tcap'
        );
    }
    return value;
}

export function decodeBcdTimestamp(register: Uint8Array, epoch: Date = new Date(0)): BcdTimestamp {
    if (register.length < BCD_REGISTER_SIZE) {
        throw new MalformedMetadataError(`Time register holds ${register.length} bytes, expected ${BCD_REGISTER_SIZE}`, 'timeRegister', 'tcap');
    }

    const days = digit(register, 3, false, 'daysHundreds') * 100
        + digit(register, 4, true, 'daysTens') * 10
        + digit(register, 4, false, 'daysUnits');
    const hours = digit(register, 5, true, 'hoursTens') * 10 + digit(register, 5, false, 'hoursUnits');
    const minutes = digit(register, 6, true, 'minutesTens') * 10 + digit(register, 6, false, 'minutesUnits');
    const wholeSeconds = digit(register, 7, true, 'secondsTens') * 10 + digit(register, 7, false, 'secondsUnits');

    // 1e-1 .. 1e-7 as one integer
    let fraction = 0;
    for (let i = 0; i < SUBSECOND_DIGITS; i++) {
        const byte = 8 + (i >> 1);
        fraction = fraction * 10 + digit(register, byte, (i & 1) === 0, `subsecond${i + 1}`);
    }

    const seconds = wholeSeconds + fraction / 1e7;
    const whole = wholeSeconds + 60 * (minutes + 60 * (hours + 24 * days));
    const epochSeconds = whole + fraction / 1e7;
    const date = new Date(epoch.getTime() + whole * 1000 + Math.floor(fraction / 1e4));

    return {
        days,
        hours,
        minutes,
        seconds,
        status: (register[3] >> 4) & 0x0f,
        epochSeconds,
        date,
        iso: date.toISOString(),
    };
}
