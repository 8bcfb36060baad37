/**
 * Bit-field codec for 16-bit RISC-4 instruction words.
 *
 *   R-Type:  [opcode:4][rd:4][rs:4][rt:4]
 *   I-Type:  [opcode:4][rd:4][rs:4][imm4:4]
 *   M-Type:  [opcode:4][rd|rs:4][base:4][offset4:4]
 *   B-Type:  [opcode:4][cond:4][offset8:8]
 *   J-Type:  [opcode:4][target12:12]   (bit 11 of the word is the link bit)
 *
 * Every function here is total over its documented input width and never
 * throws; callers mask before calling.
 */
import {
  DATA_ADDR_MASK, LINK_BIT, PC_MASK, REGISTER_MASK, TARGET12_MASK,
} from './constants';

export const mask4 = (n: number): number => n & REGISTER_MASK;
export const mask8 = (n: number): number => n & 0xFF;
export const maskPc = (n: number): number => n & PC_MASK;
export const maskDataAddress = (n: number): number => n & DATA_ADDR_MASK;

/** Sign-extend a 4-bit field: 0x8 → -8, 0x7 → 7. */
export function signExtend4(v: number): number {
  return (v & 0x8) !== 0 ? (v & 0xF) - 0x10 : v & 0xF;
}

/** Sign-extend an 8-bit field: 0x80 → -128, 0x7F → 127. */
export function signExtend8(v: number): number {
  return (v & 0x80) !== 0 ? (v & 0xFF) - 0x100 : v & 0xFF;
}

/** Two's-complement view of a register value, -8..7. */
export const toSigned4 = signExtend4;

export const opcodeOf = (word: number): number => (word >> 12) & 0xF;

export function decodeRType(word: number) {
  return {
    opcode: opcodeOf(word),
    rd: (word >> 8) & 0xF,
    rs: (word >> 4) & 0xF,
    rt: word & 0xF,
  };
}

export function decodeIType(word: number) {
  return {
    opcode: opcodeOf(word),
    rd: (word >> 8) & 0xF,
    rs: (word >> 4) & 0xF,
    imm4: word & 0xF,
  };
}

export function decodeMType(word: number) {
  return {
    opcode: opcodeOf(word),
    reg: (word >> 8) & 0xF,
    base: (word >> 4) & 0xF,
    offset4: word & 0xF,
  };
}

export function decodeBType(word: number) {
  return {
    opcode: opcodeOf(word),
    cond: (word >> 8) & 0xF,
    offset8: word & 0xFF,
  };
}

export function decodeJType(word: number) {
  return {
    opcode: opcodeOf(word),
    target12: word & TARGET12_MASK,
  };
}

/** Link flag of a J-type word. Read from the raw word, never from a decoded target. */
export function isLinkBitSet(word: number): boolean {
  return (word & LINK_BIT) !== 0;
}

/** Data address formed by a register pair: reg[base] is the high nibble, reg[base+1] the low. */
export function pairAddress(high: number, low: number): number {
  return maskDataAddress((mask4(high) << 4) | mask4(low));
}

/** Effective load/store address: pair base plus sign-extended offset, wrapped to 8 bits. */
export function effectiveAddress(baseAddress: number, offset4: number): number {
  return maskDataAddress(baseAddress + signExtend4(offset4));
}

/** Taken-branch target: byte offset scaled ×4 into nibble units, relative to the branch. */
export function branchTarget(pc: number, offset8: number): number {
  return maskPc(pc + signExtend8(offset8) * 4);
}
