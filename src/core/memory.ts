/**
 * Program images and the flat nibble memory they load into.
 *
 * Memory is 4096 nibble cells (the full 12-bit PC space). An instruction word
 * occupies four consecutive cells, most significant nibble first; loads and
 * stores reach the low 256 cells.
 */
import { INSTRUCTION_NIBBLES, MEM_SIZE, PC_MASK, WORD_MASK } from './constants';
import { PreconditionViolationError } from './errors';

/** Instruction words, or their big-endian byte form. */
export type ProgramImage = readonly number[] | Uint16Array | Uint8Array;

/** Combine big-endian byte pairs into 16-bit words. */
export function imageFromBytes(bytes: Uint8Array): number[] {
  if (bytes.length % 2 !== 0) {
    throw new PreconditionViolationError(`program image has odd byte length ${bytes.length}`);
  }
  const words: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    words.push((bytes[i] << 8) | bytes[i + 1]);
  }
  return words;
}

/** Split 16-bit words into big-endian bytes. */
export function imageToBytes(words: readonly number[] | Uint16Array): Uint8Array {
  const bytes = new Uint8Array(words.length * 2);
  for (let i = 0; i < words.length; i++) {
    const word = checkWord(words[i], i);
    bytes[i * 2] = (word >> 8) & 0xFF;
    bytes[i * 2 + 1] = word & 0xFF;
  }
  return bytes;
}

function checkWord(word: number, index: number): number {
  if (!Number.isInteger(word) || word < 0 || word > WORD_MASK) {
    throw new PreconditionViolationError(`image word ${index} is not a 16-bit value: ${word}`);
  }
  return word;
}

function toWords(image: ProgramImage): readonly number[] | Uint16Array {
  return image instanceof Uint8Array ? imageFromBytes(image) : image;
}

export function checkAddress(addr: number, what: string): number {
  if (!Number.isInteger(addr) || addr < 0 || addr > PC_MASK) {
    throw new PreconditionViolationError(
      `${what} 0x${Number.isInteger(addr) ? addr.toString(16) : String(addr)} is outside the 12-bit address space`,
    );
  }
  return addr;
}

/** Allocate a zeroed memory and lay the image out at `baseAddress`. */
export function createMemory(image: ProgramImage = [], baseAddress = 0): Uint8Array {
  checkAddress(baseAddress, 'base address');
  const words = toWords(image);
  const end = baseAddress + words.length * INSTRUCTION_NIBBLES;
  if (end > MEM_SIZE) {
    throw new PreconditionViolationError(
      `program image of ${words.length} words at 0x${baseAddress.toString(16)} does not fit in ${MEM_SIZE} nibbles`,
    );
  }

  const memory = new Uint8Array(MEM_SIZE);
  for (let i = 0; i < words.length; i++) {
    const word = checkWord(words[i], i);
    const addr = baseAddress + i * INSTRUCTION_NIBBLES;
    memory[addr] = (word >> 12) & 0xF;
    memory[addr + 1] = (word >> 8) & 0xF;
    memory[addr + 2] = (word >> 4) & 0xF;
    memory[addr + 3] = word & 0xF;
  }
  return memory;
}

/** Read the instruction word at a nibble address; wraps at the top of memory. */
export function fetchWord(memory: Uint8Array, pc: number): number {
  let word = 0;
  for (let n = 0; n < INSTRUCTION_NIBBLES; n++) {
    word = (word << 4) | (memory[(pc + n) & PC_MASK] & 0xF);
  }
  return word;
}
