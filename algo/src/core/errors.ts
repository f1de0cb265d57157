export class AlgoConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
        this.name = "AlgoConfigError";
        this.issues = issues;
    }
}

/** Raised when the driver calls a hook out of order, e.g. a turn before game start. */
export class AlgoLifecycleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "AlgoLifecycleError";
    }
}
