import pc from "picocolors";

export interface CliOutput {
  /** Success message with a green checkmark */
  success: (msg: string) => void;
  /** Info message in cyan */
  info: (msg: string) => void;
  /** Warning in yellow */
  warn: (msg: string) => void;
  /** Error in red, on stderr */
  error: (msg: string) => void;
  /** Bold header framed by blank lines */
  header: (msg: string) => void;
  /** Dimmed hint line, on stderr */
  hint: (msg: string) => void;
  /** Uncolored line */
  line: (msg: string) => void;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

export interface CliOutputOptions {
  color?: boolean;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export const createCliOutput = (options: CliOutputOptions = {}): CliOutput => {
  const colors = pc.createColors(options.color ?? pc.isColorSupported);
  const writeOut =
    options.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr =
    options.writeErr ?? ((text: string) => process.stderr.write(text));

  const println = (text: string) => writeOut(`${text}\n`);
  const eprintln = (text: string) => writeErr(`${text}\n`);

  return {
    success: (msg) => println(colors.green(`  ✓ ${msg}`)),
    info: (msg) => println(colors.cyan(`  ${msg}`)),
    warn: (msg) => println(colors.yellow(`  ⚠ ${msg}`)),
    error: (msg) => eprintln(colors.red(`  ✗ ${msg}`)),
    header: (msg) => println(`\n${colors.bold(msg)}\n`),
    hint: (msg) => eprintln(colors.dim(`    ${msg}`)),
    line: (msg) => println(msg),
    writeOut,
    writeErr,
  };
};
