import type { UnitOfWork } from "../../domain/entities/unit-of-work.entity.js";
import type { FetchStrategy } from "../../domain/strategies/fetch.strategy.js";

export class RetrieveWorkUseCase {
    constructor(private readonly strategy: FetchStrategy) {}

    async execute(): Promise<UnitOfWork | null> {
        return this.strategy.retrieveWork();
    }
}
