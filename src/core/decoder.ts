/**
 * Instruction decoder: classifies a raw 16-bit word into its format and
 * extracts the format's fields. Performs no execution.
 */
import {
  decodeBType, decodeIType, decodeJType, decodeMType, decodeRType,
  isLinkBitSet, opcodeOf,
} from './bitfields';
import {
  BRANCH_MNEMONICS, EXT_MNEMONICS, I_TYPE_MNEMONICS, JUMP_TARGET_MASK,
  OPCODE, R_TYPE_MNEMONICS, WORD_MASK,
} from './constants';
import type { Instruction, IllegalInstruction } from './types';

const hex4 = (n: number): string => '0x' + n.toString(16).toUpperCase().padStart(4, '0');

function illegal(raw: number, reason: string): IllegalInstruction {
  return { format: 'ILLEGAL', opcode: opcodeOf(raw), raw, reason };
}

export function decode(word: number): Instruction {
  const raw = word & WORD_MASK;
  const opcode = opcodeOf(raw);

  const rMnemonic = R_TYPE_MNEMONICS[opcode];
  if (rMnemonic !== undefined) {
    const { rd, rs, rt } = decodeRType(raw);
    return { format: 'R', mnemonic: rMnemonic, opcode, rd, rs, rt, raw };
  }

  const iMnemonic = I_TYPE_MNEMONICS[opcode];
  if (iMnemonic !== undefined) {
    const { rd, rs, imm4 } = decodeIType(raw);
    return { format: 'I', mnemonic: iMnemonic, opcode, rd, rs, imm4, raw };
  }

  switch (opcode) {
    case OPCODE.EXT: {
      // rt position carries the sub-opcode
      const { rd, rs, rt: funct } = decodeRType(raw);
      const mnemonic = EXT_MNEMONICS[funct];
      if (mnemonic === undefined) {
        return illegal(raw, `reserved EXT function 0x${funct.toString(16).toUpperCase()} in ${hex4(raw)}`);
      }
      return { format: 'EXT', mnemonic, opcode, rd, rs, funct, raw };
    }

    case OPCODE.LW: {
      const { reg, base, offset4 } = decodeMType(raw);
      return { format: 'M', mnemonic: 'LW', opcode, rd: reg, base, offset4, raw };
    }

    case OPCODE.SW: {
      const { reg, base, offset4 } = decodeMType(raw);
      return { format: 'M', mnemonic: 'SW', opcode, rs: reg, base, offset4, raw };
    }

    case OPCODE.BR: {
      const { cond, offset8 } = decodeBType(raw);
      const mnemonic = BRANCH_MNEMONICS[cond];
      if (mnemonic === undefined) {
        return illegal(raw, `reserved branch condition 0x${cond.toString(16).toUpperCase()} in ${hex4(raw)}`);
      }
      return { format: 'B', mnemonic, opcode, cond, offset8, raw };
    }

    case OPCODE.JMP: {
      const { target12 } = decodeJType(raw);
      return {
        format: 'J',
        mnemonic: isLinkBitSet(raw) ? 'JAL' : 'J',
        opcode,
        target: target12 & JUMP_TARGET_MASK,
        raw,
      };
    }

    default:
      return illegal(raw, `unknown opcode 0x${opcode.toString(16).toUpperCase()} in ${hex4(raw)}`);
  }
}
