import { describe, it, expect } from 'vitest';
import { decode } from './decoder';
import * as asm from './codegen/encoder';

describe('decode: formats', () => {
  it('R-type ALU op', () => {
    expect(decode(asm.add(2, 1, 1))).toEqual({
      format: 'R', mnemonic: 'ADD', opcode: 0x0, rd: 2, rs: 1, rt: 1, raw: 0x0211,
    });
  });

  it('SLT is R-type', () => {
    const inst = decode(asm.slt(7, 2, 3));
    expect(inst.format).toBe('R');
    expect(inst.format === 'R' && inst.mnemonic).toBe('SLT');
  });

  it('I-type immediate op', () => {
    expect(decode(asm.ori(1, 0, 5))).toEqual({
      format: 'I', mnemonic: 'ORI', opcode: 0xA, rd: 1, rs: 0, imm4: 5, raw: 0xA105,
    });
  });

  it('EXT carries its sub-opcode in funct', () => {
    expect(decode(asm.adc(6, 4))).toEqual({
      format: 'EXT', mnemonic: 'ADC', opcode: 0x7, rd: 6, rs: 4, funct: 0, raw: 0x7640,
    });
    const sbb = decode(asm.sbb(6, 4));
    expect(sbb.format === 'EXT' && sbb.mnemonic).toBe('SBB');
  });

  it('HALT and JR are EXT functs', () => {
    const h = decode(0x700F);
    expect(h.format === 'EXT' && h.mnemonic).toBe('HALT');
    const r = decode(0x7003);
    expect(r.format === 'EXT' && r.mnemonic).toBe('JR');
  });

  it('LW names its data register rd', () => {
    expect(decode(asm.lw(2, 1, 14))).toEqual({
      format: 'M', mnemonic: 'LW', opcode: 0xC, rd: 2, base: 14, offset4: 1, raw: 0xC2E1,
    });
  });

  it('SW names its data register rs', () => {
    expect(decode(asm.sw(6, 1, 4))).toEqual({
      format: 'M', mnemonic: 'SW', opcode: 0xD, rs: 6, base: 4, offset4: 1, raw: 0xD641,
    });
  });

  it('B-type branch', () => {
    expect(decode(asm.bcc(-2))).toEqual({
      format: 'B', mnemonic: 'BCC', opcode: 0xE, cond: 3, offset8: 0xFE, raw: 0xE3FE,
    });
  });

  it('J-type keeps the raw word alongside the target', () => {
    expect(decode(0xF010)).toEqual({
      format: 'J', mnemonic: 'J', opcode: 0xF, target: 0x010, raw: 0xF010,
    });
    expect(decode(0xF810)).toEqual({
      format: 'J', mnemonic: 'JAL', opcode: 0xF, target: 0x010, raw: 0xF810,
    });
  });

  it('masks input to 16 bits', () => {
    const inst = decode(0x1A105);
    expect(inst.raw).toBe(0xA105);
  });
});

describe('decode: illegal encodings', () => {
  it('reserved EXT functs are illegal', () => {
    for (let funct = 0x4; funct <= 0xE; funct++) {
      const inst = decode(0x7000 | funct);
      expect(inst.format).toBe('ILLEGAL');
    }
  });

  it('reserved branch conditions are illegal', () => {
    for (let cond = 0x4; cond <= 0xF; cond++) {
      const inst = decode(0xE000 | (cond << 8) | 0x01);
      expect(inst.format).toBe('ILLEGAL');
    }
  });

  it('illegal record carries the raw word and a reason', () => {
    expect(decode(0x7004)).toEqual({
      format: 'ILLEGAL',
      opcode: 0x7,
      raw: 0x7004,
      reason: 'reserved EXT function 0x4 in 0x7004',
    });
    expect(decode(0xE501)).toEqual({
      format: 'ILLEGAL',
      opcode: 0xE,
      raw: 0xE501,
      reason: 'reserved branch condition 0x5 in 0xE501',
    });
  });
});
