import { commandLine, ProcessHandler, Shell, ShellCommandError, ShellExecResult } from "../src/Shell";

export interface ShellInvocation {
    readonly kind: "exec" | "spawn";
    readonly command: string;
    readonly args: string[];
}

export interface FakeResponse {
    readonly exitCode?: number;
    readonly stdout?: string;
    readonly stderr?: string;
}

interface Rule {
    readonly prefix: string[];
    readonly response: FakeResponse;
}

/**
 * Records every command and answers from rules matching on the command line prefix.
 * The most recently added matching rule wins; unmatched commands succeed with no output.
 */
export class FakeShell extends Shell {

    readonly invocations: ShellInvocation[] = [];
    readonly missingCommands = new Set<string>();
    private readonly rules: Rule[] = [];

    on(prefix: string[], response: FakeResponse): this {
        this.rules.push({ prefix, response });
        return this;
    }

    lines(): string[] {
        return this.invocations.map(invocation => commandLine(invocation.command, invocation.args));
    }

    async exec(command: string, args: string[]): Promise<ShellExecResult> {
        this.invocations.push({ kind: "exec", command, args });
        const response = this.respond(command, args);
        const exitCode = response.exitCode ?? 0;
        if(exitCode !== 0) {
            throw new ShellCommandError(commandLine(command, args), exitCode, response.stderr);
        }
        return {
            stdout: response.stdout ?? "",
            stderr: response.stderr ?? "",
        };
    }

    async spawn(command: string, args: string[], handler: ProcessHandler): Promise<void> {
        this.invocations.push({ kind: "spawn", command, args });
        const response = this.respond(command, args);
        if(response.stdout) {
            await handler.onStdOut(Buffer.from(response.stdout, "utf-8"));
        }
        if(response.stderr) {
            await handler.onStdErr(Buffer.from(response.stderr, "utf-8"));
        }
        const exitCode = response.exitCode ?? 0;
        await handler.onClose(exitCode);
        if(exitCode !== 0) {
            throw new ShellCommandError(commandLine(command, args), exitCode, response.stderr);
        }
    }

    async commandExists(command: string): Promise<boolean> {
        return !this.missingCommands.has(command);
    }

    private respond(command: string, args: string[]): FakeResponse {
        const line = [ command, ...args ];
        for(let i = this.rules.length - 1; i >= 0; --i) {
            const rule = this.rules[i];
            if(rule.prefix.every((value, index) => line[index] === value)) {
                return rule.response;
            }
        }
        return {};
    }
}
