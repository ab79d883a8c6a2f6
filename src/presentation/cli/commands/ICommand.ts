import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'resolve')
     */
    name: string;

    /**
     * Positional arguments in yargs notation (e.g., '[url]')
     */
    positionals?: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Command aliases (e.g., ['r'] for 'resolve')
     */
    aliases?: string[];

    /**
     * Execute the command and return the process exit code
     */
    execute(args: CommandArgs): Promise<number>;

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];
}

export type OptionValue = string | number | boolean | undefined;

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    /**
     * Positional arguments
     */
    _: Array<string | number>;

    /**
     * Named options/flags
     */
    [key: string]: unknown;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean';
    default?: OptionValue;
    required?: boolean;
    choices?: string[];
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;
    positionals?: string;
    aliases?: string[];

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<number>;

    abstract getOptions(): CommandOption[];

    /**
     * Validate command arguments
     */
    protected validateArgs(args: CommandArgs): void {
        const options = this.getOptions();

        for (const option of options) {
            if (option.required && args[option.name] === undefined) {
                throw new ValidationError(`Missing required option: --${option.name}`);
            }

            const value = args[option.name];
            if (option.choices && value !== undefined && !option.choices.includes(String(value))) {
                throw new ValidationError(
                    `Invalid value for --${option.name}: ${String(value)}. ` +
                    `Valid choices are: ${option.choices.join(', ')}`
                );
            }
        }
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = this.getOption(args, name);
        return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : undefined;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = this.getOption(args, name);
        return typeof value === 'number' ? value : undefined;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean {
        return this.getOption(args, name) === true;
    }

    /**
     * Get option value with default
     */
    private getOption(args: CommandArgs, name: string): unknown {
        if (args[name] !== undefined) {
            return args[name];
        }
        return this.getOptions().find(o => o.name === name)?.default;
    }
}
