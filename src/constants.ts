// Codeword layout and sizing constants shared by the encoder and decoder

// 0-255: single-byte literals
export const LITERAL_CODEWORDS = 256
// Never assigned to an entry
export const RESERVED_CODEWORD = 256
export const FIRST_DYNAMIC_CODEWORD = 257

// Codewords are fixed-width unsigned 32-bit integers
export const CODEWORD_BYTES = 4
export const MAX_CODEWORD = 0xFFFFFFFF

// Index slots for the 256 literals plus the reserved codeword
export const SEED_TABLE_CAPACITY = FIRST_DYNAMIC_CODEWORD
export const DEFAULT_ARENA_SIZE = 4096
export const DEFAULT_TRIE_CAPACITY = 1024
