// IQT frames: ten int16 fields and one int32 tick counter, then Q/I int16 pairs.
export const IQT_FRAME_HEADER_SIZE = 10 * 2 + 4;
export const IQT_BYTES_PER_SAMPLE = 4;

export interface IqtFrameHeader {
    reserved1: number;
    validA: number;
    validP: number;
    validI: number;
    validQ: number;
    bins: number;
    reserved2: number;
    triggered: number;
    overLoad: number;
    lastFrame: number;
    ticks: number;
}

// TIQ payload: little-endian int32 I then Q.
export const TIQ_BYTES_PER_SAMPLE = 8;

// TCAP: fixed grid of 88-byte headers and 2^17-byte payloads.
export const TCAP_BLOCK_HEADER_SIZE = 88;
export const TCAP_BLOCK_PAYLOAD_SIZE = 2 ** 17;
export const TCAP_BLOCK_SIZE = TCAP_BLOCK_HEADER_SIZE + TCAP_BLOCK_PAYLOAD_SIZE;
export const TCAP_BYTES_PER_SAMPLE = 4;
export const TCAP_TIME_REGISTER_SIZE = 12;
export const TCAP_POSITION_INDICATOR_SIZE = 12;
export const TCAP_SCALERS_SIZE = 64;

// Raw complex64 files: float32 re, float32 im.
export const BIN_BYTES_PER_SAMPLE = 8;
