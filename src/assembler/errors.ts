/**
 * Assembler errors
 *
 * Every failure aborts the compilation; nothing here is recoverable.
 */

function hex(value: number, width = 4): string {
  return '$' + value.toString(16).toUpperCase().padStart(width, '0');
}

export class AssemblyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssemblyError';
  }
}

export class UnknownInstructionError extends AssemblyError {
  constructor(public readonly mnemonic: string, public readonly mode: string) {
    super(`Unknown instruction: ${mnemonic} has no ${mode} addressing mode`);
    this.name = 'UnknownInstructionError';
  }
}

export class IllegalAddressingError extends AssemblyError {
  constructor(public readonly mnemonic: string, message: string) {
    super(`${mnemonic}: ${message}`);
    this.name = 'IllegalAddressingError';
  }
}

export class DuplicateLabelError extends AssemblyError {
  constructor(public readonly label: string) {
    super(`Double definition of label '${label}'`);
    this.name = 'DuplicateLabelError';
  }
}

export class UndefinedLabelError extends AssemblyError {
  constructor(public readonly label: string) {
    super(`Undefined label '${label}'`);
    this.name = 'UndefinedLabelError';
  }
}

export class OwnershipConflictError extends AssemblyError {
  constructor(
    public readonly address: number,
    public readonly existingOwner: string,
    public readonly newOwner: string,
  ) {
    super(
      `Memory location ${address} (${hex(address)}) is owned by ${existingOwner} and cannot be reassigned by ${newOwner}`,
    );
    this.name = 'OwnershipConflictError';
  }
}

export class BranchOutOfRangeError extends AssemblyError {
  constructor(
    public readonly mnemonic: string,
    public readonly pc: number,
    public readonly target: number,
    public readonly displacement: number,
  ) {
    super(`Branch out of range: ${displacement} (${mnemonic} at ${hex(pc)} to ${hex(target)})`);
    this.name = 'BranchOutOfRangeError';
  }
}

export class ArityError extends AssemblyError {
  constructor(message: string) {
    super(`Wrong number of arguments: ${message}`);
    this.name = 'ArityError';
  }
}

export class ByteRangeError extends AssemblyError {
  constructor(public readonly value: number) {
    super(
      Number.isInteger(value)
        ? `Value ${value} is out of byte range [0..255]`
        : `Value ${value} is not a valid integer`,
    );
    this.name = 'ByteRangeError';
  }
}

export class AddressRangeError extends AssemblyError {
  constructor(public readonly address: number) {
    super(`Address ${address} is outside the address space [0..65535]`);
    this.name = 'AddressRangeError';
  }
}

export class ValueRangeError extends AssemblyError {
  constructor(public readonly value: number) {
    super(`Number out of range: ${value}`);
    this.name = 'ValueRangeError';
  }
}

export class PassMismatchError extends AssemblyError {
  constructor(message: string) {
    super(`Discovery and final pass disagree: ${message}`);
    this.name = 'PassMismatchError';
  }
}

export class ConfigError extends AssemblyError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
