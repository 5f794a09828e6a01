export const WAVETAP_TOOL_NAME = 'wavetap';

export const WAVETAP_VERSION = '0.1.0';

export const DEFAULT_OUTPUT_PATH = 'waves.vcd';

export const DEFAULT_TIMESCALE = '1ps';
