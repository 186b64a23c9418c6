import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { CommandFormatter } from './formatter.js';
import type { ToolExecutor } from './executor.js';
import { FormatterSchema } from '../types/index.js';

describe('CommandFormatter', () => {
    let testDir: string;
    const exec = vi.fn(async (..._args: Parameters<ToolExecutor>): ReturnType<ToolExecutor> => ({ exitCode: 0, stdout: '' }));

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'restage-formatter-test-'));
        exec.mockReset();
        exec.mockResolvedValue({ exitCode: 0, stdout: '' });
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    const rustfmt = () => FormatterSchema.parse({
        command: 'rustfmt',
        check: true,
        config_file: 'tests/fmt.toml',
    });

    it('runs check mode with the flattened config before the file', async () => {
        const formatter = new CommandFormatter('rs', rustfmt(), testDir, exec);
        if (!formatter.check) throw new Error('expected a check mode');

        const outcome = await formatter.check('src/lib.rs', 'edition=2021,max_width=100');

        expect(exec).toHaveBeenCalledWith(
            'rustfmt',
            ['--check', '--config', 'edition=2021,max_width=100', 'src/lib.rs'],
            { cwd: testDir }
        );
        expect(outcome).toEqual({
            command: 'rustfmt --check --config edition=2021,max_width=100 src/lib.rs',
            exitCode: 0,
        });
    });

    it('runs write mode without the check flag', async () => {
        const formatter = new CommandFormatter('rs', rustfmt(), testDir, exec);

        await formatter.write('src/lib.rs', 'edition=2021');

        expect(exec).toHaveBeenCalledWith('rustfmt', ['--config', 'edition=2021', 'src/lib.rs'], { cwd: testDir });
    });

    it('omits the config flag when there are no options', async () => {
        const formatter = new CommandFormatter('rs', rustfmt(), testDir, exec);

        await formatter.write('src/lib.rs', '');

        expect(exec).toHaveBeenCalledWith('rustfmt', ['src/lib.rs'], { cwd: testDir });
    });

    it('has no check mode unless configured', async () => {
        const black = new CommandFormatter('py', FormatterSchema.parse({ command: 'black', args: ['-q'] }), testDir, exec);

        expect(black.check).toBeUndefined();
        expect(await black.resolveOptions()).toBeUndefined();

        exec.mockResolvedValueOnce({ exitCode: 123, stdout: '' });
        const outcome = await black.write('tools/gen.py');
        expect(exec).toHaveBeenCalledWith('black', ['-q', 'tools/gen.py'], { cwd: testDir });
        expect(outcome.exitCode).toBe(123);
    });

    it('reads and flattens the config file on every call', async () => {
        fs.mkdirSync(path.join(testDir, 'tests'));
        const configPath = path.join(testDir, 'tests', 'fmt.toml');
        fs.writeFileSync(configPath, 'edition="2021"\nlicense_template_path="tests/license.txt"\n');
        const formatter = new CommandFormatter('rs', rustfmt(), testDir, exec);

        expect(await formatter.resolveOptions()).toBe('edition=2021,license_template_path=tests/license.txt');

        fs.writeFileSync(configPath, 'edition="2018"\n');
        expect(await formatter.resolveOptions()).toBe('edition=2018');
    });

    it('rejects when the config file is missing', async () => {
        const formatter = new CommandFormatter('rs', rustfmt(), testDir, exec);

        await expect(formatter.resolveOptions()).rejects.toThrow('Formatter config not found: tests/fmt.toml');
    });

    it('honors custom flags and leading args', async () => {
        const settings = FormatterSchema.parse({
            command: 'cargo',
            args: ['fmt', '--'],
            check: true,
            check_flag: '--verify',
            config_flag: '--cfg',
        });
        const formatter = new CommandFormatter('rs', settings, testDir, exec);

        expect(formatter.buildArgs([settings.check_flag], 'a.rs', 'x=1')).toEqual(['fmt', '--', '--verify', '--cfg', 'x=1', 'a.rs']);
    });
});
