/**
 * Instruction word encoders for RISC-4.
 *
 * Word formats (16 bits):
 *   R-Type:  [opcode:4][rd:4][rs:4][rt:4]
 *   EXT:     [0x7:4][rd:4][rs:4][funct:4]
 *   I-Type:  [opcode:4][rd:4][rs:4][imm4:4]
 *   M-Type:  [opcode:4][rd|rs:4][base:4][offset4:4]
 *   B-Type:  [0xE:4][cond:4][offset8:8]
 *   J-Type:  [0xF:4][link:1][target:11]
 *
 * Immediates and offsets are taken as signed or unsigned numbers and masked
 * to their field width, so `addi(1, 1, -1)` and `addi(1, 1, 0xF)` are the same
 * word. No text parsing or label resolution happens here.
 */
import { COND, FUNCT, JUMP_TARGET_MASK, LINK_BIT, OPCODE } from '../constants';

const f4 = (n: number): number => n & 0xF;

export function encodeR(opcode: number, rd: number, rs: number, rt: number): number {
  return (f4(opcode) << 12) | (f4(rd) << 8) | (f4(rs) << 4) | f4(rt);
}

export function encodeI(opcode: number, rd: number, rs: number, imm4: number): number {
  return (f4(opcode) << 12) | (f4(rd) << 8) | (f4(rs) << 4) | f4(imm4);
}

export function encodeM(opcode: number, reg: number, base: number, offset4: number): number {
  return (f4(opcode) << 12) | (f4(reg) << 8) | (f4(base) << 4) | f4(offset4);
}

export function encodeExt(rd: number, rs: number, funct: number): number {
  return encodeR(OPCODE.EXT, rd, rs, funct);
}

export function encodeBranch(cond: number, offset8: number): number {
  return (OPCODE.BR << 12) | (f4(cond) << 8) | (offset8 & 0xFF);
}

/**
 * The link flag and the target never share a bit: a target with bit 11 set
 * loses it rather than turning a plain jump into a call.
 */
export function encodeJump(target: number, link: boolean): number {
  return (OPCODE.JMP << 12) | (link ? LINK_BIT : 0) | (target & JUMP_TARGET_MASK);
}

// ============================================================================
// Per-mnemonic helpers
// ============================================================================

export const add  = (rd: number, rs: number, rt: number) => encodeR(OPCODE.ADD, rd, rs, rt);
export const sub  = (rd: number, rs: number, rt: number) => encodeR(OPCODE.SUB, rd, rs, rt);
export const and  = (rd: number, rs: number, rt: number) => encodeR(OPCODE.AND, rd, rs, rt);
export const or   = (rd: number, rs: number, rt: number) => encodeR(OPCODE.OR, rd, rs, rt);
export const xor  = (rd: number, rs: number, rt: number) => encodeR(OPCODE.XOR, rd, rs, rt);
export const slt  = (rd: number, rs: number, rt: number) => encodeR(OPCODE.SLT, rd, rs, rt);

/** Shift rs by `amount` (0-7) into rd. */
export const shl  = (rd: number, rs: number, amount: number) => encodeI(OPCODE.SHF, rd, rs, amount & 0x7);
export const shr  = (rd: number, rs: number, amount: number) => encodeI(OPCODE.SHF, rd, rs, 0x8 | (amount & 0x7));

export const addi = (rd: number, rs: number, imm: number) => encodeI(OPCODE.ADDI, rd, rs, imm);
export const andi = (rd: number, rs: number, imm: number) => encodeI(OPCODE.ANDI, rd, rs, imm);
export const ori  = (rd: number, rs: number, imm: number) => encodeI(OPCODE.ORI, rd, rs, imm);
export const slti = (rd: number, rs: number, imm: number) => encodeI(OPCODE.SLTI, rd, rs, imm);

export const adc  = (rd: number, rs: number) => encodeExt(rd, rs, FUNCT.ADC);
export const sbb  = (rd: number, rs: number) => encodeExt(rd, rs, FUNCT.SBB);
export const neg  = (rd: number, rs: number) => encodeExt(rd, rs, FUNCT.NEG);
export const jr   = () => encodeExt(0, 0, FUNCT.JR);
export const halt = () => encodeExt(0, 0, FUNCT.HALT);

export const lw   = (rd: number, offset: number, base: number) => encodeM(OPCODE.LW, rd, base, offset);
export const sw   = (rs: number, offset: number, base: number) => encodeM(OPCODE.SW, rs, base, offset);

/** Branch offsets count instructions relative to the branch itself. */
export const beq  = (offset: number) => encodeBranch(COND.BEQ, offset);
export const bne  = (offset: number) => encodeBranch(COND.BNE, offset);
export const bcs  = (offset: number) => encodeBranch(COND.BCS, offset);
export const bcc  = (offset: number) => encodeBranch(COND.BCC, offset);

export const j    = (target: number) => encodeJump(target, false);
export const jal  = (target: number) => encodeJump(target, true);

export const nop  = () => add(0, 0, 0);
