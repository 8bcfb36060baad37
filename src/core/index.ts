export { Risc4 } from './risc4';
export type { Risc4Options, ResetOptions } from './risc4';
export { decode } from './decoder';
export { execute, commit } from './execute';
export {
  signExtend4, signExtend8, toSigned4,
  decodeRType, decodeIType, decodeMType, decodeBType, decodeJType,
  isLinkBitSet, mask4, mask8, maskPc, maskDataAddress,
  pairAddress, effectiveAddress, branchTarget,
} from './bitfields';
export { createMemory, fetchWord, imageFromBytes, imageToBytes } from './memory';
export type { ProgramImage } from './memory';
export { disassembleWord, disassembleRange, formatInstruction, formatWord, formatTrace } from './disassembler';
export { PreconditionViolationError } from './errors';
export * as asm from './codegen/encoder';
export * from './constants';
export * from './types';
