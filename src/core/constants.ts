import type { BMnemonic, ExtMnemonic, IMnemonic, RMnemonic } from './types';

export const NUM_REGISTERS = 16;
export const REGISTER_MASK = 0xF;     // 4-bit register width
export const PC_MASK = 0xFFF;         // 12-bit nibble-addressed PC
export const DATA_ADDR_MASK = 0xFF;   // 8-bit load/store effective address
export const WORD_MASK = 0xFFFF;      // 16-bit instruction word
export const MEM_SIZE = PC_MASK + 1;  // 4096 nibble cells

// One instruction word = 4 nibbles
export const INSTRUCTION_NIBBLES = 4;

// Bit 11 of a J-type word selects JAL over J
export const LINK_BIT = 1 << 11;
export const JUMP_TARGET_MASK = 0x7FF;
export const TARGET12_MASK = 0xFFF;

// JAL writes the return address here, high nibble first; JR reads it back
export const LINK_REGISTERS = [1, 2, 3] as const;

export const OPCODE = {
  ADD:  0x0,
  SUB:  0x1,
  AND:  0x2,
  OR:   0x3,
  XOR:  0x4,
  SLT:  0x5,
  SHF:  0x6,
  EXT:  0x7,
  ADDI: 0x8,
  ANDI: 0x9,
  ORI:  0xA,
  SLTI: 0xB,
  LW:   0xC,
  SW:   0xD,
  BR:   0xE,
  JMP:  0xF,
} as const;

// Sub-opcodes of EXT (low nibble). 0x4-0xE are reserved.
export const FUNCT = {
  ADC:  0x0,
  SBB:  0x1,
  NEG:  0x2,
  JR:   0x3,
  HALT: 0xF,
} as const;

// Branch conditions (bits 11-8 of a B-type word). 0x4-0xF are reserved.
export const COND = {
  BEQ: 0x0,
  BNE: 0x1,
  BCS: 0x2,
  BCC: 0x3,
} as const;

export const R_TYPE_MNEMONICS: Partial<Record<number, RMnemonic>> = {
  [OPCODE.ADD]: 'ADD',
  [OPCODE.SUB]: 'SUB',
  [OPCODE.AND]: 'AND',
  [OPCODE.OR]:  'OR',
  [OPCODE.XOR]: 'XOR',
  [OPCODE.SLT]: 'SLT',
};

export const I_TYPE_MNEMONICS: Partial<Record<number, IMnemonic>> = {
  [OPCODE.SHF]:  'SHF',
  [OPCODE.ADDI]: 'ADDI',
  [OPCODE.ANDI]: 'ANDI',
  [OPCODE.ORI]:  'ORI',
  [OPCODE.SLTI]: 'SLTI',
};

export const EXT_MNEMONICS: Partial<Record<number, ExtMnemonic>> = {
  [FUNCT.ADC]:  'ADC',
  [FUNCT.SBB]:  'SBB',
  [FUNCT.NEG]:  'NEG',
  [FUNCT.JR]:   'JR',
  [FUNCT.HALT]: 'HALT',
};

export const BRANCH_MNEMONICS: Partial<Record<number, BMnemonic>> = {
  [COND.BEQ]: 'BEQ',
  [COND.BNE]: 'BNE',
  [COND.BCS]: 'BCS',
  [COND.BCC]: 'BCC',
};

// SHF imm4 layout: bit 3 direction (1 = right), bits 2-0 amount
export const SHIFT_RIGHT_BIT = 0x8;
export const SHIFT_AMOUNT_MASK = 0x7;
