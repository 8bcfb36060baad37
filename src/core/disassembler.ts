import { signExtend4, signExtend8 } from './bitfields';
import { INSTRUCTION_NIBBLES, PC_MASK } from './constants';
import { decode } from './decoder';
import { fetchWord } from './memory';
import type { Instruction, MachineSnapshot } from './types';

const hex = (n: number, digits: number): string =>
  '0x' + n.toString(16).toUpperCase().padStart(digits, '0');

const signed = (n: number): string => (n < 0 ? `${n}` : `+${n}`);

/**
 * Format a decoded instruction in assembler syntax.
 *
 * Examples:
 *   ADD r2, r1, r1
 *   ORI r1, r0, #5
 *   LW r2, 1(r14)
 *   BEQ +2
 *   JAL 0x010
 *   .word 0x7004      (reserved encoding)
 */
export function formatInstruction(inst: Instruction): string {
  switch (inst.format) {
    case 'R':
      return `${inst.mnemonic} r${inst.rd}, r${inst.rs}, r${inst.rt}`;
    case 'I': {
      if (inst.mnemonic === 'SHF') {
        const dir = (inst.imm4 & 0x8) !== 0 ? 'R' : 'L';
        return `SHF r${inst.rd}, r${inst.rs}, ${dir}${inst.imm4 & 0x7}`;
      }
      // ADDI and SLTI take a signed immediate, ANDI and ORI an unsigned one
      const imm = inst.mnemonic === 'ADDI' || inst.mnemonic === 'SLTI'
        ? signExtend4(inst.imm4)
        : inst.imm4;
      return `${inst.mnemonic} r${inst.rd}, r${inst.rs}, #${imm}`;
    }
    case 'EXT':
      switch (inst.mnemonic) {
        case 'HALT': return 'HALT';
        case 'JR':   return 'JR';
        default:     return `${inst.mnemonic} r${inst.rd}, r${inst.rs}`;
      }
    case 'M':
      return inst.mnemonic === 'LW'
        ? `LW r${inst.rd}, ${signExtend4(inst.offset4)}(r${inst.base})`
        : `SW r${inst.rs}, ${signExtend4(inst.offset4)}(r${inst.base})`;
    case 'B':
      return `${inst.mnemonic} ${signed(signExtend8(inst.offset8))}`;
    case 'J':
      return `${inst.mnemonic} ${hex(inst.target, 3)}`;
    case 'ILLEGAL':
      return `.word ${hex(inst.raw, 4)}`;
  }
}

/** Disassemble a raw 16-bit word. */
export function disassembleWord(word: number): string {
  return formatInstruction(decode(word));
}

/**
 * Format a word with its nibble address prefix.
 *
 * Example:
 *   formatWord(0xA105, 0x004) → "[0x004] A105  ORI r1, r0, #5"
 */
export function formatWord(word: number, addr: number): string {
  const raw = word.toString(16).toUpperCase().padStart(4, '0');
  return `[${hex(addr, 3)}] ${raw}  ${disassembleWord(word)}`;
}

/**
 * Disassemble `count` instruction words from a nibble memory starting at a
 * nibble address. Addresses wrap at the end of the 12-bit space.
 *
 * Example:
 *   disassembleRange(memory, 0, 2)
 *   → ["[0x000] A105  ORI r1, r0, #5", "[0x004] 0211  ADD r2, r1, r1"]
 */
export function disassembleRange(memory: Uint8Array, start: number, count: number): string[] {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    const addr = (start + i * INSTRUCTION_NIBBLES) & PC_MASK;
    lines.push(formatWord(fetchWord(memory, addr), addr));
  }
  return lines;
}

/**
 * One trace line per executed instruction: address, word and disassembly,
 * followed by the state after the step.
 */
export function formatTrace(step: number, pc: number, word: number, after: MachineSnapshot): string {
  const regs = after.registers.map(r => r.toString(16).toUpperCase()).join('');
  const flags = `C=${after.flags.c ? 1 : 0} Z=${after.flags.z ? 1 : 0}`;
  return `[${String(step).padStart(4)}] ${formatWord(word, pc).padEnd(36)} → PC=${hex(after.pc, 3)} R=${regs} ${flags}`;
}
