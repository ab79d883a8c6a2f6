import { ICommand, CommandArgs, CommandOption } from './commands/ICommand';
import { Logger } from '../../shared/logging/Logger';
import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private appName: string = 'postmedia',
        private version: string = '1.0.0'
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application and return the process exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        const args = hideBin(argv);
        let exitCode = 0;

        try {
            // Build yargs instance
            const yargsInstance = yargs(args)
                .scriptName(this.appName)
                .version(this.version)
                .help()
                .alias('h', 'help')
                .alias('v', 'version')
                .strict()
                .exitProcess(false)
                .fail(false)
                .wrap(100);

            // Add commands
            this.commands.forEach((command, name) => {
                const signature = command.positionals ? `${name} ${command.positionals}` : name;
                yargsInstance.command(
                    [signature, ...(command.aliases ?? [])],
                    command.description,
                    builder => this.configureCommand(builder, command),
                    async parsed => {
                        exitCode = await this.executeCommand(command, parsed);
                    }
                );
            });

            // Default command: a bare URL resolves it
            const defaultCommand = this.commands.get('resolve');
            if (defaultCommand) {
                yargsInstance.command(
                    `$0 ${defaultCommand.positionals ?? ''}`.trim(),
                    defaultCommand.description,
                    builder => this.configureCommand(builder, defaultCommand),
                    async parsed => {
                        exitCode = await this.executeCommand(defaultCommand, parsed);
                    }
                );
            }

            // Parse and execute
            await yargsInstance.parseAsync();

        } catch (error) {
            this.logger.error('CLI error', error);
            console.error(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
            return 1;
        }

        return exitCode;
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        command.getOptions().forEach(option => {
            builder.option(option.name, this.toYargsOption(option));
        });
        return builder;
    }

    private toYargsOption(option: CommandOption): Options {
        const config: Options = {
            describe: option.description,
            type: option.type,
            demandOption: option.required
        };

        if (option.default !== undefined) {
            config.default = option.default;
        }
        if (option.choices) {
            config.choices = option.choices;
        }
        if (option.alias) {
            config.alias = option.alias;
        }

        return config;
    }

    private async executeCommand(command: ICommand, parsed: Record<string, unknown>): Promise<number> {
        const args: CommandArgs = {
            ...parsed,
            _: Array.isArray(parsed._) ? parsed._.map(value => String(value)) : []
        };
        return command.execute(args);
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
