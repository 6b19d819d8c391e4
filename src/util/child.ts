import child_process, { execFile } from 'node:child_process';
import util from 'node:util';

export interface RunResult {
    stdout: string;
    stderr: string;
}

export type Runner = (file: string, args: string[], options?: child_process.ExecFileOptions) => Promise<RunResult>;

// Engines print per-segment progress when verbose; allow plenty of output
const MAX_BUFFER = 64 * 1024 * 1024;

export const run: Runner = async (file, args, options = {}) => {
    const execFilePromise = util.promisify(execFile);
    const optionsWithEncoding = { maxBuffer: MAX_BUFFER, ...options, encoding: 'utf8' as const };
    const result = await execFilePromise(file, args, optionsWithEncoding);
    return {
        stdout: result.stdout.toString(),
        stderr: result.stderr.toString(),
    };
};
