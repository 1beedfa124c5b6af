/**
 * Program Tests
 *
 * Unknown commands are answered with the closest registered name.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Command } from 'commander';

import { createProgram } from '../program.js';

describe('createProgram', () => {
  let program: Command;
  let errors: string[];

  beforeEach(() => {
    program = createProgram();
    errors = [];
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({
        writeErr: (text) => errors.push(text),
        writeOut: () => undefined,
      });
    }
  });

  it('should register the tenant group', () => {
    expect(program.name()).toBe('tenantctl');
    expect(program.commands.map((command) => command.name())).toEqual(['tenant']);
  });

  it('should suggest the closest top-level command', () => {
    expect(() => program.parse(['tenat'], { from: 'user' })).toThrow();

    expect(errors.join('')).toBe("error: unknown command 'tenat'\n(Did you mean tenant?)\n");
  });

  it('should suggest the closest subcommand inside the tenant group', () => {
    expect(() => program.parse(['tenant', 'provsion'], { from: 'user' })).toThrow();

    expect(errors.join('')).toBe("error: unknown command 'provsion'\n(Did you mean provision?)\n");
  });
});
