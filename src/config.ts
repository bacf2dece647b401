import path from 'path';
import process from 'process';
import fs from 'fs';
import { z } from 'zod';
import { LOG_LEVELS, logToStderr } from './utils/logger.js';
import type { AssemblyOptions } from './tools/docx/types.js';

export const CONFIG_FILE = path.join(process.cwd(), 'docx-model.config.json');

export const ConfigSchema = z.object({
    strictComments: z.boolean().default(false),
    strictHyperlinks: z.boolean().default(false),
    strictEmbeds: z.boolean().default(false),
    logLevel: z.enum(LOG_LEVELS).default('info'),
}).strict();

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

// Load configuration
export function loadConfig(configFile: string = CONFIG_FILE): Config {
    try {
        if (fs.existsSync(configFile)) {
            const configContent = fs.readFileSync(configFile, 'utf8');
            return ConfigSchema.parse(JSON.parse(configContent));
        }
    } catch (error) {
        logToStderr('error', `Error loading config ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
    }

    // Return default config if loading fails
    return { ...DEFAULT_CONFIG };
}

export function toAssemblyOptions(config: Config): AssemblyOptions {
    return {
        strictComments: config.strictComments,
        strictHyperlinks: config.strictHyperlinks,
        strictEmbeds: config.strictEmbeds,
    };
}
