import { describe, it, expect } from 'vitest';
import {
  signExtend4, signExtend8, toSigned4,
  decodeRType, decodeIType, decodeMType, decodeBType, decodeJType,
  isLinkBitSet, pairAddress, effectiveAddress, branchTarget,
  mask4, maskPc, maskDataAddress,
} from './bitfields';

// ============================================================================
// Sign extension
// ============================================================================

describe('signExtend4', () => {
  it('0b1000 is the most negative value', () => {
    expect(signExtend4(0b1000)).toBe(-8);
  });

  it('0b0111 is the most positive value', () => {
    expect(signExtend4(0b0111)).toBe(7);
  });

  it('0xF is -1 and 0 stays 0', () => {
    expect(signExtend4(0xF)).toBe(-1);
    expect(signExtend4(0)).toBe(0);
  });

  it('matches v | 0xFFFFFFF0 as a 32-bit signed value for every negative field', () => {
    for (let v = 8; v < 16; v++) {
      expect(signExtend4(v)).toBe(v | 0xFFFFFFF0);
    }
  });

  it('toSigned4 reinterprets register values the same way', () => {
    expect(toSigned4(0x9)).toBe(-7);
    expect(toSigned4(0x3)).toBe(3);
  });
});

describe('signExtend8', () => {
  it('0x80 is negative, 0x7F positive', () => {
    expect(signExtend8(0x80)).toBe(-128);
    expect(signExtend8(0x7F)).toBe(127);
  });

  it('0xFF is -1, 0xFE is -2', () => {
    expect(signExtend8(0xFF)).toBe(-1);
    expect(signExtend8(0xFE)).toBe(-2);
  });
});

// ============================================================================
// Field extraction
// ============================================================================

describe('format field extraction', () => {
  it('R-type splits four nibbles', () => {
    expect(decodeRType(0x1234)).toEqual({ opcode: 0x1, rd: 0x2, rs: 0x3, rt: 0x4 });
  });

  it('I-type keeps the immediate unsigned', () => {
    expect(decodeIType(0x8EEF)).toEqual({ opcode: 0x8, rd: 0xE, rs: 0xE, imm4: 0xF });
  });

  it('M-type data register sits in bits 11-8', () => {
    expect(decodeMType(0xD5E3)).toEqual({ opcode: 0xD, reg: 0x5, base: 0xE, offset4: 0x3 });
  });

  it('B-type offset is the low byte', () => {
    expect(decodeBType(0xE3FE)).toEqual({ opcode: 0xE, cond: 0x3, offset8: 0xFE });
  });

  it('J-type target is the low 12 bits', () => {
    expect(decodeJType(0xF810)).toEqual({ opcode: 0xF, target12: 0x810 });
  });

  it('link bit is bit 11 of the raw word', () => {
    expect(isLinkBitSet(0xF810)).toBe(true);
    expect(isLinkBitSet(0xF010)).toBe(false);
    expect(isLinkBitSet(0x0800)).toBe(true);
  });
});

// ============================================================================
// Address arithmetic
// ============================================================================

describe('address arithmetic', () => {
  it('register pair forms high:low nibbles of an 8-bit address', () => {
    expect(pairAddress(0x3, 0x2)).toBe(0x32);
    expect(pairAddress(0xF, 0xF)).toBe(0xFF);
  });

  it('effective address adds the sign-extended offset', () => {
    expect(effectiveAddress(0x32, 0x1)).toBe(0x33);
    expect(effectiveAddress(0x32, 0xF)).toBe(0x31);
    expect(effectiveAddress(0x40, 0x8)).toBe(0x38);
  });

  it('effective address wraps instead of faulting', () => {
    expect(effectiveAddress(0xFF, 0x1)).toBe(0x00);
    expect(effectiveAddress(0x00, 0xF)).toBe(0xFF);
  });

  it('branch offset is scaled ×4 into nibble units', () => {
    expect(branchTarget(0, 1)).toBe(4);
    expect(branchTarget(0x010, 0xFF)).toBe(0x00C);
  });

  it('branch target wraps at 12 bits', () => {
    expect(branchTarget(0xFFC, 0x01)).toBe(0x000);
    expect(branchTarget(0x000, 0xFF)).toBe(0xFFC);
  });

  it('masks clamp to their widths', () => {
    expect(mask4(0x1F)).toBe(0xF);
    expect(maskPc(0x1004)).toBe(0x004);
    expect(maskDataAddress(0x123)).toBe(0x23);
  });
});
