import { loadConfig, toAssemblyOptions } from './config.js';
import { DocxError } from './tools/docx/errors.js';
import { describeDocument, formatOutline, openDocx } from './tools/docx/read.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

export interface InspectIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

const defaultIO: InspectIO = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
};

export const INSPECT_USAGE = 'Usage: docx-model inspect <file.docx> [--json]';

/**
 * `docx-model inspect <file> [--json]`: print the outline of a document.
 * Resolves to the process exit code.
 */
export async function runInspect(args: string[], io: InspectIO = defaultIO): Promise<number> {
    const json = args.includes('--json');
    const files = args.filter((arg) => arg !== '--json');
    if (files.length !== 1) {
        io.stderr(`${INSPECT_USAGE}\n`);
        return 2;
    }

    const config = loadConfig();
    setLogLevel(config.logLevel);

    try {
        const outline = describeDocument(await openDocx(files[0], toAssemblyOptions(config)));
        io.stdout(`${json ? JSON.stringify(outline, null, 2) : formatOutline(outline)}\n`);
        return 0;
    } catch (error) {
        if (error instanceof DocxError) {
            io.stderr(`${error.code}: ${error.message}\n`);
            return 1;
        }
        logToStderr('error', `Unexpected failure inspecting ${files[0]}: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
        return 1;
    }
}
