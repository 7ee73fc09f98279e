import ora from 'ora';

/** Progress line for a long analysis; the last call to `succeed` or `fail` ends it. */
export interface SpinnerHandle {
  update(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

type ProgressStream = NodeJS.WriteStream;

/**
 * stderr keeps stdout pipeable. A verbose run also logs to stderr, which would
 * tear an animated line, so it moves to stdout when that is a terminal.
 */
function progressStream(env: NodeJS.ProcessEnv = process.env): ProgressStream {
  const verbose = env.TESTLAYERS_VERBOSE === '1' && env.TESTLAYERS_QUIET !== '1';
  return verbose && process.stdout.isTTY ? process.stdout : process.stderr;
}

/** One line per phase, for CI logs and pipes. */
function lineSpinner(stream: ProgressStream, text: string): SpinnerHandle {
  const line = (mark: string, t: string) => stream.write(`  ${mark}${t}\n`);
  line('', text);
  return {
    update: (t) => line('', t),
    succeed: (t) => line('✔ ', t),
    fail: (t) => line('✖ ', t)
  };
}

export function startSpinner(text: string): SpinnerHandle {
  const stream = progressStream();
  if (!stream.isTTY || process.env.TESTLAYERS_QUIET === '1') return lineSpinner(stream, text);

  // ora disables itself under CI=1 even with a terminal attached.
  const spinner = ora({ text, stream, indent: 2, isEnabled: true }).start();
  return {
    update: (t) => {
      spinner.text = t;
    },
    succeed: (t) => spinner.succeed(t),
    fail: (t) => spinner.fail(t)
  };
}
