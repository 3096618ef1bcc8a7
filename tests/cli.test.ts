import { describe, it, expect } from 'vitest';
import { createProgram } from '@/cli.js';

describe('createProgram', () => {
  it('should register every operator command', () => {
    const names = createProgram().commands.map((command) => command.name());

    expect(names).toEqual([
      'stop-all',
      'clear-locks',
      'backup-embedded',
      'backup-server-backend',
      'rollback-to-embedded',
      'rollback-to-server',
      'select-backend',
      'list-backups',
      'prune-backups',
      'status',
      'doctor',
    ]);
  });

  it('should reject an unknown --backend before running anything', async () => {
    const program = createProgram().exitOverride();
    for (const command of program.commands) {
      command.exitOverride().configureOutput({ writeErr: () => {} });
    }

    await expect(program.parseAsync(['list-backups', '--backend', 'mysql'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });

  it('should require --keep for prune-backups', async () => {
    const program = createProgram().exitOverride();
    for (const command of program.commands) {
      command.exitOverride().configureOutput({ writeErr: () => {} });
    }

    await expect(program.parseAsync(['prune-backups'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
  });
});
