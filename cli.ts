import bs58check from 'bs58check';
import { Command, CommanderError } from 'commander';
import { createDeriver, Deriver } from './deriver';
import { description, name, version } from './package.json';
import { Output } from './types';

const defaultOutput: Output = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text)
};

const EXAMPLE = `
Example:
  $ ${name} tprv8ZgxMBicQKsPd... m/84h/1h/0h/0/0`;

const build = (deriver: Deriver, output: Output, done: (code: number) => void): Command =>
  new Command()
    .name(name)
    .version(version)
    .description(description)
    .argument('<extended-key>', 'Extended private key (base58check, e.g. tprv...)')
    .argument('<path>', "Derivation path, e.g. m/84h/1h/0h/0/0 (h or ' marks hardened)")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .addHelpText('after', EXAMPLE)
    .configureOutput({ writeOut: output.stdout, writeErr: output.stderr })
    .exitOverride()
    .action((extendedKey: string, path: string) => {
      const result = deriver.deriveWif(extendedKey, path);
      if (!result.ok) {
        output.stderr(`ERROR: ${result.error.message}\n`);
        done(1);
        return;
      }
      output.stdout(`${result.value}\n`);
      done(0);
    });

/**
 * Parse `argv` (as in `process.argv`), run the derivation and return the
 * process exit code. Every failure maps to 1.
 */
export const run = (argv: string[], output: Output = defaultOutput, deriver: Deriver = createDeriver({ codec: bs58check })): number => {
  let code = 1;
  try {
    build(deriver, output, c => (code = c)).parse(argv, { from: 'node' });
    return code;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 1;
    output.stderr(`ERROR: ${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  }
};
