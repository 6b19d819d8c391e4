import { describe, expect, test, beforeEach, vi } from 'vitest';

const { mockExecFile, mockExecFilePromise, mockPromisify } = vi.hoisted(() => ({
    mockExecFile: vi.fn(),
    mockExecFilePromise: vi.fn(),
    mockPromisify: vi.fn(),
}));

vi.mock('node:child_process', () => ({
    default: { execFile: mockExecFile },
    execFile: mockExecFile,
}));

vi.mock('node:util', () => ({
    default: { promisify: mockPromisify },
}));

describe('child util', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockPromisify.mockReturnValue(mockExecFilePromise);
    });

    test('runs a file with arguments and returns its output', async () => {
        mockExecFilePromise.mockResolvedValue({ stdout: 'done\n', stderr: 'progress\n' });
        const { run } = await import('../../src/util/child');

        const result = await run('whisper', ['episode.mp3', '--model', 'base']);

        expect(mockPromisify).toHaveBeenCalledWith(mockExecFile);
        expect(mockExecFilePromise).toHaveBeenCalledWith('whisper', ['episode.mp3', '--model', 'base'], {
            maxBuffer: 64 * 1024 * 1024,
            encoding: 'utf8',
        });
        expect(result).toEqual({ stdout: 'done\n', stderr: 'progress\n' });
    });

    test('passes caller options through', async () => {
        mockExecFilePromise.mockResolvedValue({ stdout: '', stderr: '' });
        const { run } = await import('../../src/util/child');

        await run('whisper', [], { cwd: '/work', maxBuffer: 1024 });

        expect(mockExecFilePromise).toHaveBeenCalledWith('whisper', [], {
            cwd: '/work',
            maxBuffer: 1024,
            encoding: 'utf8',
        });
    });

    test('rejects when the process fails', async () => {
        mockExecFilePromise.mockRejectedValue(new Error('Command failed: whisper'));
        const { run } = await import('../../src/util/child');

        await expect(run('whisper', ['missing.mp3'])).rejects.toThrow('Command failed: whisper');
    });
});
