/**
 * RISC-4 execution engine.
 *
 * `execute` is a pure function of the present state: it reads every operand
 * (including a destructive op's destination) into locals, computes, and
 * returns the resulting writes as an `Effects` record. `commit` applies them.
 * Nothing is written while operands are still being read.
 */
import {
  branchTarget, effectiveAddress, isLinkBitSet, mask4, maskPc, pairAddress,
  signExtend4, toSigned4,
} from './bitfields';
import {
  INSTRUCTION_NIBBLES, LINK_REGISTERS, NUM_REGISTERS, SHIFT_AMOUNT_MASK,
  SHIFT_RIGHT_BIT,
} from './constants';
import { FaultKind, MachineStatus } from './types';
import type {
  BTypeInstruction, Effects, ExtInstruction, Flags, ITypeInstruction,
  Instruction, JTypeInstruction, MTypeInstruction, MachineState,
  RTypeInstruction, RegisterWrite,
} from './types';

interface AluResult {
  value: number;
  flags: Flags;
}

const reg = (state: MachineState, index: number): number => state.registers[index & 0xF];

/** Writes to r0 are dropped here; values are masked to register width. */
function regWrite(index: number, value: number): RegisterWrite[] {
  if ((index & 0xF) === 0) return [];
  return [{ index: index & 0xF, value: mask4(value) }];
}

function sequential(state: MachineState): number {
  return maskPc(state.pc + INSTRUCTION_NIBBLES);
}

// ============================================================================
// Flag rules
// ============================================================================

/** Addition: carry is the true carry-out of the unmasked sum. */
function arith(sum: number): AluResult {
  const value = mask4(sum);
  return { value, flags: { c: sum > 0xF || sum < 0, z: value === 0 } };
}

/** Logical ops and compares: carry always cleared. */
function logical(result: number): AluResult {
  const value = mask4(result);
  return { value, flags: { c: false, z: value === 0 } };
}

function shift(value: number, imm4: number): AluResult {
  const amount = imm4 & SHIFT_AMOUNT_MASK;
  if (amount === 0) return logical(value);

  if ((imm4 & SHIFT_RIGHT_BIT) !== 0) {
    const result = value >> amount;
    const c = ((value >> (amount - 1)) & 1) === 1;
    return { value: result, flags: { c, z: result === 0 } };
  }

  const result = mask4(value << amount);
  // Last bit shifted out is bit (4 - amount); nothing left to shift past 4
  const c = amount <= 4 && ((value >> (4 - amount)) & 1) === 1;
  return { value: result, flags: { c, z: result === 0 } };
}

// ============================================================================
// Per-format execution
// ============================================================================

function alu(state: MachineState, rd: number, result: AluResult): Effects {
  return {
    registerWrites: regWrite(rd, result.value),
    flags: result.flags,
    nextPc: sequential(state),
    halt: false,
  };
}

function executeR(state: MachineState, inst: RTypeInstruction): Effects {
  const a = reg(state, inst.rs);
  const b = reg(state, inst.rt);
  switch (inst.mnemonic) {
    case 'ADD': return alu(state, inst.rd, arith(a + b));
    case 'SUB': return alu(state, inst.rd, arith(a - b));
    case 'AND': return alu(state, inst.rd, logical(a & b));
    case 'OR':  return alu(state, inst.rd, logical(a | b));
    case 'XOR': return alu(state, inst.rd, logical(a ^ b));
    case 'SLT': return alu(state, inst.rd, logical(toSigned4(a) < toSigned4(b) ? 1 : 0));
  }
}

function executeI(state: MachineState, inst: ITypeInstruction): Effects {
  const a = reg(state, inst.rs);
  switch (inst.mnemonic) {
    case 'SHF':  return alu(state, inst.rd, shift(a, inst.imm4));
    case 'ADDI': return alu(state, inst.rd, arith(a + signExtend4(inst.imm4)));
    case 'ANDI': return alu(state, inst.rd, logical(a & inst.imm4));
    case 'ORI':  return alu(state, inst.rd, logical(a | inst.imm4));
    case 'SLTI': return alu(state, inst.rd, logical(toSigned4(a) < signExtend4(inst.imm4) ? 1 : 0));
  }
}

function executeExt(state: MachineState, inst: ExtInstruction): Effects {
  // Destructive ops: rd's current value is an operand
  const d = reg(state, inst.rd);
  const s = reg(state, inst.rs);
  const carryIn = state.flags.c ? 1 : 0;

  switch (inst.mnemonic) {
    case 'ADC': return alu(state, inst.rd, arith(d + s + carryIn));
    case 'SBB': return alu(state, inst.rd, arith(d - s - carryIn));
    case 'NEG': {
      const value = mask4(0 - s);
      return alu(state, inst.rd, { value, flags: { c: s !== 0, z: value === 0 } });
    }
    case 'JR': {
      const [hi, mid, lo] = LINK_REGISTERS;
      const target = (reg(state, hi) << 8) | (reg(state, mid) << 4) | reg(state, lo);
      return { registerWrites: [], nextPc: maskPc(target), halt: false };
    }
    case 'HALT':
      return { registerWrites: [], nextPc: state.pc, halt: true };
  }
}

function executeM(state: MachineState, inst: MTypeInstruction): Effects {
  const base = pairAddress(reg(state, inst.base), reg(state, (inst.base + 1) % NUM_REGISTERS));
  const address = effectiveAddress(base, inst.offset4);
  const nextPc = sequential(state);

  if (inst.mnemonic === 'LW') {
    return { registerWrites: regWrite(inst.rd, state.memory[address]), nextPc, halt: false };
  }
  return {
    registerWrites: [],
    memoryWrite: { address, value: reg(state, inst.rs) },
    nextPc,
    halt: false,
  };
}

function branchTaken(flags: Flags, inst: BTypeInstruction): boolean {
  switch (inst.mnemonic) {
    case 'BEQ': return flags.z;
    case 'BNE': return !flags.z;
    case 'BCS': return flags.c;
    case 'BCC': return !flags.c;
  }
}

function executeB(state: MachineState, inst: BTypeInstruction): Effects {
  const nextPc = branchTaken(state.flags, inst)
    ? branchTarget(state.pc, inst.offset8)
    : sequential(state);
  return { registerWrites: [], nextPc, halt: false };
}

function executeJ(state: MachineState, inst: JTypeInstruction): Effects {
  // Target is already a nibble address; never rescaled
  const nextPc = maskPc(inst.target);
  if (!isLinkBitSet(inst.raw)) {
    return { registerWrites: [], nextPc, halt: false };
  }

  const ret = sequential(state);
  const [hi, mid, lo] = LINK_REGISTERS;
  return {
    registerWrites: [
      ...regWrite(hi, ret >> 8),
      ...regWrite(mid, ret >> 4),
      ...regWrite(lo, ret),
    ],
    nextPc,
    halt: false,
  };
}

/**
 * Compute the effects of one decoded instruction against the present state.
 * An illegal instruction yields a fault and leaves PC where it was.
 */
export function execute(state: MachineState, inst: Instruction): Effects {
  switch (inst.format) {
    case 'R':   return executeR(state, inst);
    case 'I':   return executeI(state, inst);
    case 'EXT': return executeExt(state, inst);
    case 'M':   return executeM(state, inst);
    case 'B':   return executeB(state, inst);
    case 'J':   return executeJ(state, inst);
    case 'ILLEGAL':
      return {
        registerWrites: [],
        nextPc: state.pc,
        halt: true,
        fault: {
          kind: FaultKind.ILLEGAL_INSTRUCTION,
          pc: state.pc,
          word: inst.raw,
          message: `illegal instruction at 0x${state.pc.toString(16).toUpperCase().padStart(3, '0')}: ${inst.reason}`,
        },
      };
  }
}

/**
 * Apply effects to a state, returning the next state. The input state is not
 * modified. A faulting instruction commits nothing but the halt.
 */
export function commit(state: MachineState, effects: Effects): MachineState {
  if (effects.fault) {
    return { ...state, status: MachineStatus.HALTED };
  }

  let registers = state.registers;
  if (effects.registerWrites.length > 0) {
    registers = state.registers.slice();
    for (const w of effects.registerWrites) {
      if (w.index !== 0) registers[w.index] = mask4(w.value);
    }
  }

  let memory = state.memory;
  if (effects.memoryWrite) {
    memory = state.memory.slice();
    memory[effects.memoryWrite.address] = mask4(effects.memoryWrite.value);
  }

  return {
    registers,
    pc: maskPc(effects.nextPc),
    flags: effects.flags ?? state.flags,
    memory,
    status: effects.halt ? MachineStatus.HALTED : state.status,
  };
}
