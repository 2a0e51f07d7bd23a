import type { UnitOfWork } from "../../domain/entities/unit-of-work.entity.js";
import type { FetchStrategy } from "../../domain/strategies/fetch.strategy.js";

export class RequeueWorkUseCase {
    constructor(private readonly strategy: FetchStrategy) {}

    /** Single unit, e.g. after the processor threw. Redis errors propagate. */
    async execute(unit: UnitOfWork): Promise<void> {
        await unit.requeue();
    }

    /** Everything still checked out at shutdown. Never rejects. */
    async executeMany(inProgress: readonly UnitOfWork[]): Promise<void> {
        await this.strategy.bulkRequeue(inProgress);
    }
}
