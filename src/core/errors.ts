/**
 * Error taxonomy for tooldrive.
 *
 * Only configuration, provider, iteration-limit and cancellation errors cross
 * the agent loop boundary. Tool errors are converted into tool results by the
 * registry and fed back to the model.
 */

export class ToolDriveError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// ── Provider errors ──────────────────────────────────────────────────────────

export class ProviderError extends ToolDriveError {}

export class ProviderNotFoundError extends ProviderError {
    readonly provider: string;

    constructor(provider: string) {
        super(`Provider '${provider}' is not available`);
        this.provider = provider;
    }
}

/** Missing or invalid credential; raised before any network attempt. */
export class ProviderConfigError extends ProviderError {
    readonly provider: string;
    readonly reason: string;

    constructor(provider: string, reason: string) {
        super(`Invalid configuration for '${provider}': ${reason}`);
        this.provider = provider;
        this.reason = reason;
    }
}

export class ModelNotFoundError extends ProviderError {
    readonly model: string;
    readonly provider: string;

    constructor(model: string, provider: string) {
        super(`Model '${model}' not found for provider '${provider}'`);
        this.model = model;
        this.provider = provider;
    }
}

export class ApiError extends ProviderError {
    readonly provider: string;
    readonly statusCode: number | undefined;

    constructor(provider: string, message: string, statusCode?: number) {
        super(`API error from '${provider}': ${message}`);
        this.provider = provider;
        this.statusCode = statusCode;
    }
}

// ── Tool errors ──────────────────────────────────────────────────────────────

export class ToolError extends ToolDriveError {}

export class ToolNotFoundError extends ToolError {
    readonly toolName: string;

    constructor(toolName: string) {
        super(`Tool '${toolName}' is not registered`);
        this.toolName = toolName;
    }
}

export class DuplicateToolError extends ToolError {
    readonly toolName: string;

    constructor(toolName: string) {
        super(`Tool '${toolName}' is already registered`);
        this.toolName = toolName;
    }
}

/** Thrown by a tool's `execute`; `reason` becomes the model-facing error text. */
export class ToolExecutionError extends ToolError {
    readonly toolName: string;
    readonly reason: string;

    constructor(toolName: string, reason: string) {
        super(`Tool '${toolName}' failed: ${reason}`);
        this.toolName = toolName;
        this.reason = reason;
    }
}

// ── Agent errors ─────────────────────────────────────────────────────────────

export class AgentError extends ToolDriveError {}

export class MaxIterationsError extends AgentError {
    readonly maxIterations: number;

    constructor(maxIterations: number) {
        super(`Agent exceeded maximum iterations (${maxIterations})`);
        this.maxIterations = maxIterations;
    }
}

export class AgentCancelledError extends AgentError {
    constructor() {
        super('Agent turn was cancelled');
    }
}

export class MessageValidationError extends AgentError {}

// ── Configuration errors ─────────────────────────────────────────────────────

export class ConfigError extends ToolDriveError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
