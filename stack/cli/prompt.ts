import { createInterface } from "node:readline";
import { Writable } from "node:stream";

function ask(label: string, hidden: boolean): Promise<string> {
  const output = hidden
    ? new Writable({
        write(_data, _enc, cb) {
          cb();
        },
      })
    : process.stderr;
  const rl = createInterface({ input: process.stdin, output, terminal: true });
  if (hidden) process.stderr.write(`${label}: `);
  return new Promise((done) => {
    rl.question(hidden ? "" : `${label}: `, (line) => {
      rl.close();
      if (hidden) process.stderr.write("\n");
      done(line);
    });
  });
}

// Piped stdin is read once; login and password come from consecutive lines
let piped: Promise<string[]> | null = null;
let consumed = 0;

function collectPiped(): Promise<string[]> {
  return new Promise((done) => {
    const lines: string[] = [];
    const rl = createInterface({ input: process.stdin });
    rl.on("line", (line) => {
      lines.push(line);
    });
    rl.on("close", () => {
      done(lines);
    });
  });
}

async function nextPipedLine(field: string): Promise<string> {
  piped ??= collectPiped();
  const line = (await piped)[consumed];
  if (line === undefined) {
    throw new Error(`No ${field} provided on stdin`);
  }
  consumed += 1;
  return line;
}

/** Login shown, password hidden on a terminal; otherwise two lines of stdin. */
export async function getCredentials(): Promise<{ login: string; password: string }> {
  if (process.stdin.isTTY) {
    const login = await ask("Login", false);
    const password = await ask("Password", true);
    return { login, password };
  }
  const login = await nextPipedLine("login");
  const password = await nextPipedLine("password");
  return { login, password };
}
