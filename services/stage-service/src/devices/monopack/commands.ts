// services/stage-service/src/devices/monopack/commands.ts

/** Command bytes of the driver's binary command set. */
export const MONOPACK_COMMAND = {
    // motor current + frequency
    CURRENT_LIMIT: 0x10,
    CURRENT_CONTROL: 0x11,
    FREQUENCY_RANGE: 0x12,
    MICROSTEP_RESOLUTION: 0x17,
    GET_CURRENT_CONTROL: 0x53,

    // ramp parameters
    VELOCITY_ACCELERATION: 0x14,
    BOW: 0x63,
    GET_ACCELERATION_VELOCITY: 0x52,

    // motion
    GET_ACTUAL_POSITION: 0x20,
    GET_ACTUAL_ACCELERATION_VELOCITY: 0x21,
    DRIVE_RAMP: 0x23,
    CONSTANT_ROTATION: 0x25,
    RESET_POSITION: 0x27,
    SOFT_STOP: 0x2a,
    EMERGENCY_STOP: 0x2b,

    // stop / reference switches
    REFERENCE_SEARCH: 0x22,
    MICROSTEPS_PER_REVOLUTION: 0x15,
    REFERENCE_SEARCH_VELOCITY: 0x16,
    GET_SWITCH_STATES: 0x30,
    SWITCH_MODE: 0x54,
    STOP_SWITCH_DECELERATION: 0x57,
    TRAVEL_CHECK_TOLERANCE: 0x59,

    // encoder, deviation, correction
    AUTO_CORRECTION: 0x58,
    ENCODER_CONFIGURATION: 0x70,
    GET_ENCODER_COUNTER: 0x71,
    DEVIATION_ALARM: 0x73,

    // PID register passthrough
    PID_6A: 0x6a,
    PID_6B: 0x6b,
    PID_6C: 0x6c,
    PID_6D: 0x6d,
    PID_FOLLOW: 0x6f,

    // alarm
    STEP_DIRECTION_MODE: 0x50,
    ALARM_MODE: 0x51,
    RESET_ALARM: 0x74,

    // global settings
    GET_VERSION: 0x43,
    RECEIVE_ID: 0x55,
    SEND_ID: 0x56,
    CAN_BAUD_RATE: 0xc0,
    HARDWARE_RESET: 0xcc,
    FACTORY_DEFAULTS: 0xdd,
} as const

export type MonopackCommand = typeof MONOPACK_COMMAND[keyof typeof MONOPACK_COMMAND]

/** P0 storage-control byte on "set" commands. */
export const STORAGE = {
    PERSIST: 0,
    APPLY: 1,
    READ_STORED: 2,
    READ_LIVE: 3,
} as const

export type StorageMode = typeof STORAGE[keyof typeof STORAGE]

/** Number of raw register bytes each PID passthrough command carries after P0. */
export const PID_REGISTER_BYTES = {
    [MONOPACK_COMMAND.PID_6A]: 4,
    [MONOPACK_COMMAND.PID_6B]: 6,
    [MONOPACK_COMMAND.PID_6C]: 3,
    [MONOPACK_COMMAND.PID_6D]: 4,
} as const

export type PidRegisterCommand = keyof typeof PID_REGISTER_BYTES

/** Key bytes the factory reset command must carry in P1/P2. */
export const FACTORY_RESET_KEY = [0x31, 0x41] as const

export const CAN_BAUD_RATES = {
    1: '125 kBit/s',
    2: '250 kBit/s',
    3: '500 kBit/s',
    4: '1 MBit/s',
} as const

export type CanBaudRateCode = keyof typeof CAN_BAUD_RATES
