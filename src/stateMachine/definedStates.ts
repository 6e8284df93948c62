// src/stateMachine/definedStates.ts

export enum EncoderStates {
    INIT = 'INIT',
    READ_SECRET = 'READ_SECRET',
    LOAD_CARRIER = 'LOAD_CARRIER',
    CHECK_CAPACITY = 'CHECK_CAPACITY',
    EMBED_PAYLOAD = 'EMBED_PAYLOAD',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    VERIFY_ENCODING = 'VERIFY_ENCODING',
    COMPLETED = 'COMPLETED',
    ERROR = 'ENCODER_ERROR',
}

export enum DecoderStates {
    INIT = 'INIT',
    LOAD_STEGO_IMAGE = 'LOAD_STEGO_IMAGE',
    EXTRACT_PAYLOAD = 'EXTRACT_PAYLOAD',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'DECODER_ERROR',
}
