// 4-bit register value / memory cell (stored as standard JS number, masked to 4 bits)
export type Nibble = number;

// 16-bit instruction word
export type Word16 = number;

export const MachineStatus = {
  RUNNING: 'running',
  HALTED: 'halted',
} as const;
export type MachineStatus = typeof MachineStatus[keyof typeof MachineStatus];

export const FaultKind = {
  ILLEGAL_INSTRUCTION: 'IllegalInstruction',
} as const;
export type FaultKind = typeof FaultKind[keyof typeof FaultKind];

export const StopReason = {
  HALT: 'halt',
  FAULT: 'fault',
  STEP_LIMIT: 'step-limit',
  BREAKPOINT: 'breakpoint',
} as const;
export type StopReason = typeof StopReason[keyof typeof StopReason];

export interface Flags {
  c: boolean;
  z: boolean;
}

/**
 * Complete architectural state. Each simulator instance owns one of these;
 * nothing is shared between instances.
 */
export interface MachineState {
  registers: Uint8Array;  // 16 entries, r0 always 0
  pc: number;             // 12-bit nibble address
  flags: Flags;
  memory: Uint8Array;     // 4096 nibble cells
  status: MachineStatus;
}

// ============================================================================
// Decoded instructions, one case per format
// ============================================================================

export type RMnemonic = 'ADD' | 'SUB' | 'AND' | 'OR' | 'XOR' | 'SLT';
export type ExtMnemonic = 'ADC' | 'SBB' | 'NEG' | 'JR' | 'HALT';
export type IMnemonic = 'SHF' | 'ADDI' | 'ANDI' | 'ORI' | 'SLTI';
export type BMnemonic = 'BEQ' | 'BNE' | 'BCS' | 'BCC';
export type JMnemonic = 'J' | 'JAL';
export type Mnemonic = RMnemonic | ExtMnemonic | IMnemonic | 'LW' | 'SW' | BMnemonic | JMnemonic;

export interface RTypeInstruction {
  format: 'R';
  mnemonic: RMnemonic;
  opcode: number;
  rd: number;
  rs: number;
  rt: number;
  raw: Word16;
}

/** Opcode 0x7: register pair plus a sub-opcode in the low nibble. */
export interface ExtInstruction {
  format: 'EXT';
  mnemonic: ExtMnemonic;
  opcode: number;
  rd: number;
  rs: number;
  funct: number;
  raw: Word16;
}

export interface ITypeInstruction {
  format: 'I';
  mnemonic: IMnemonic;
  opcode: number;
  rd: number;
  rs: number;
  imm4: number;
  raw: Word16;
}

export interface LoadInstruction {
  format: 'M';
  mnemonic: 'LW';
  opcode: number;
  rd: number;
  base: number;
  offset4: number;
  raw: Word16;
}

export interface StoreInstruction {
  format: 'M';
  mnemonic: 'SW';
  opcode: number;
  /** Data register being stored (same bit position as LW's rd). */
  rs: number;
  base: number;
  offset4: number;
  raw: Word16;
}

export type MTypeInstruction = LoadInstruction | StoreInstruction;

export interface BTypeInstruction {
  format: 'B';
  mnemonic: BMnemonic;
  opcode: number;
  cond: number;
  offset8: number;
  raw: Word16;
}

/**
 * Jump. `target` is the 11-bit nibble-address region; whether the jump links
 * is a property of bit 11 of `raw`, not of the target.
 */
export interface JTypeInstruction {
  format: 'J';
  mnemonic: JMnemonic;
  opcode: number;
  target: number;
  raw: Word16;
}

export interface IllegalInstruction {
  format: 'ILLEGAL';
  opcode: number;
  raw: Word16;
  reason: string;
}

export type Instruction =
  | RTypeInstruction
  | ExtInstruction
  | ITypeInstruction
  | MTypeInstruction
  | BTypeInstruction
  | JTypeInstruction
  | IllegalInstruction;

// ============================================================================
// Execution results
// ============================================================================

export interface Fault {
  kind: FaultKind;
  pc: number;
  word: Word16;
  message: string;
}

export interface RegisterWrite {
  index: number;
  value: Nibble;
}

export interface MemoryWrite {
  address: number;
  value: Nibble;
}

/**
 * Everything one instruction changes, computed from the pre-step state
 * before any of it is committed.
 */
export interface Effects {
  registerWrites: RegisterWrite[];
  flags?: Flags;
  memoryWrite?: MemoryWrite;
  nextPc: number;
  halt: boolean;
  fault?: Fault;
}

export interface StepResult {
  halted: boolean;
  fault?: Fault;
}

export interface RunResult extends StepResult {
  steps: number;
  stopReason: StopReason;
}

export interface MachineSnapshot {
  status: MachineStatus;
  pc: number;
  registers: Nibble[];
  flags: Flags;
  stepCount: number;
  lastFault: Fault | null;
}
