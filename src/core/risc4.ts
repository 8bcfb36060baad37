/**
 * RISC-4 simulator: fetch / decode / execute loop and the core entry API.
 *
 * Each instance owns its own MachineState; instances share nothing.
 */
import { mask4, maskPc } from './bitfields';
import { NUM_REGISTERS } from './constants';
import { decode } from './decoder';
import { formatTrace } from './disassembler';
import { PreconditionViolationError } from './errors';
import { commit, execute } from './execute';
import { checkAddress, createMemory, fetchWord } from './memory';
import type { ProgramImage } from './memory';
import { MachineStatus, StopReason } from './types';
import type {
  Fault, Flags, MachineSnapshot, MachineState, Nibble, RunResult, StepResult,
} from './types';

export interface Risc4Options {
  /** Receives one line per executed instruction and one per fault. */
  trace?: (line: string) => void;
  /** Step budget used by run() when none is given. */
  defaultMaxSteps?: number;
}

export interface ResetOptions {
  /** Nibble address execution starts at. Defaults to the base address. */
  entryPc?: number;
  /** Nibble address the image is loaded at. Defaults to 0. */
  baseAddress?: number;
}

function initialState(memory: Uint8Array, pc: number): MachineState {
  return {
    registers: new Uint8Array(NUM_REGISTERS),
    pc,
    flags: { c: false, z: false },
    memory,
    status: MachineStatus.RUNNING,
  };
}

export class Risc4 {
  private state: MachineState;
  private lastFault: Fault | null = null;
  private breakpoints: Set<number> = new Set();
  private readonly trace?: (line: string) => void;
  private readonly defaultMaxSteps: number;

  // Step counter
  stepCount = 0;

  constructor(options: Risc4Options = {}) {
    this.trace = options.trace;
    this.defaultMaxSteps = options.defaultMaxSteps ?? 1_000_000;
    this.state = initialState(createMemory(), 0);
  }

  // ========================================================================
  // Reset
  // ========================================================================

  /**
   * Load a program image and put the machine in its initial state:
   * running, PC at the entry point, registers and flags zero.
   * Throws PreconditionViolationError for an out-of-range entry point or image.
   */
  reset(image: ProgramImage = [], options: ResetOptions = {}): void {
    const baseAddress = options.baseAddress ?? 0;
    const memory = createMemory(image, baseAddress);
    const entryPc = checkAddress(options.entryPc ?? baseAddress, 'entry point');

    this.state = initialState(memory, entryPc);
    this.lastFault = null;
    this.stepCount = 0;
  }

  // ========================================================================
  // Stepping
  // ========================================================================

  /**
   * Execute one instruction. A halted machine executes nothing and reports
   * the same result again.
   */
  step(): StepResult {
    if (this.state.status === MachineStatus.HALTED) {
      return this.result();
    }

    const pc = this.state.pc;
    const word = fetchWord(this.state.memory, pc);
    const inst = decode(word);
    const effects = execute(this.state, inst);
    this.state = commit(this.state, effects);
    this.stepCount++;

    if (effects.fault) {
      this.lastFault = effects.fault;
      this.trace?.(`fault: ${effects.fault.message}`);
    } else if (this.trace) {
      this.trace(formatTrace(this.stepCount, pc, word, this.getSnapshot()));
    }

    return this.result();
  }

  /**
   * Step until HALT, a fault, a breakpoint or the step budget.
   * A breakpoint at the current PC does not stop the first step, so run()
   * resumes from a breakpoint it previously stopped on.
   */
  run(maxSteps: number = this.defaultMaxSteps): RunResult {
    let steps = 0;
    while (steps < maxSteps) {
      if (this.state.status === MachineStatus.HALTED) break;
      if (steps > 0 && this.breakpoints.has(this.state.pc)) {
        return { ...this.result(), steps, stopReason: StopReason.BREAKPOINT };
      }
      this.step();
      steps++;
    }

    if (this.state.status === MachineStatus.HALTED) {
      const stopReason = this.lastFault ? StopReason.FAULT : StopReason.HALT;
      return { ...this.result(), steps, stopReason };
    }
    return { ...this.result(), steps, stopReason: StopReason.STEP_LIMIT };
  }

  private result(): StepResult {
    const halted = this.state.status === MachineStatus.HALTED;
    return this.lastFault ? { halted, fault: this.lastFault } : { halted };
  }

  // ========================================================================
  // Breakpoints
  // ========================================================================

  setBreakpoint(addr: number): void {
    this.breakpoints.add(checkAddress(addr, 'breakpoint'));
  }

  clearBreakpoint(addr: number): void {
    this.breakpoints.delete(addr);
  }

  clearAllBreakpoints(): void {
    this.breakpoints.clear();
  }

  // ========================================================================
  // State queries
  // ========================================================================

  getStatus(): MachineStatus {
    return this.state.status;
  }

  getPc(): number {
    return this.state.pc;
  }

  getFlags(): Flags {
    return { ...this.state.flags };
  }

  getRegisters(): Nibble[] {
    return Array.from(this.state.registers);
  }

  getRegister(index: number): Nibble {
    return this.state.registers[checkRegister(index)];
  }

  readMemory(addr: number): Nibble {
    return this.state.memory[maskPc(addr)];
  }

  /** Copy of all 4096 nibble cells. */
  getMemory(): Uint8Array {
    return this.state.memory.slice();
  }

  getLastFault(): Fault | null {
    return this.lastFault;
  }

  getSnapshot(): MachineSnapshot {
    return {
      status: this.state.status,
      pc: this.state.pc,
      registers: this.getRegisters(),
      flags: this.getFlags(),
      stepCount: this.stepCount,
      lastFault: this.lastFault,
    };
  }

  // ========================================================================
  // Poking state (debugging front-ends, test setup)
  // ========================================================================

  /** Set a register before running. Writes to r0 are discarded. */
  setRegister(index: number, value: Nibble): void {
    checkRegister(index);
    checkNibble(value);
    if (index === 0) return;
    const registers = this.state.registers.slice();
    registers[index] = mask4(value);
    this.state = { ...this.state, registers };
  }

  writeMemory(addr: number, value: Nibble): void {
    checkAddress(addr, 'memory address');
    checkNibble(value);
    const memory = this.state.memory.slice();
    memory[addr] = value;
    this.state = { ...this.state, memory };
  }

  setFlags(flags: Flags): void {
    this.state = { ...this.state, flags: { ...flags } };
  }
}

function checkRegister(index: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= NUM_REGISTERS) {
    throw new PreconditionViolationError(`register index ${index} out of range 0-${NUM_REGISTERS - 1}`);
  }
  return index;
}

function checkNibble(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xF) {
    throw new PreconditionViolationError(`value ${value} is not a 4-bit quantity`);
  }
}
