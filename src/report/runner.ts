import type { Report, RoleSource } from '../types/index.js';
import { InputError } from '../utils/errors.js';
import { aggregate } from './aggregator.js';

/**
 * Check the person name before anything touches the network.
 * @returns the trimmed name
 */
export function validatePersonName(name: string | undefined): string {
    const trimmed = name?.trim() ?? '';
    if (!trimmed) {
        throw new InputError('A person name is required, e.g. -n "Firstname Lastname"');
    }
    return trimmed;
}

/**
 * Fetch every role for a person, one category after another, and aggregate.
 * The first failing fetch aborts the run.
 */
export async function generateReport(
    name: string | undefined,
    source: RoleSource,
    clock: () => number = () => performance.now()
): Promise<Report> {
    const person = validatePersonName(name);
    const startedAt = clock();

    const authored = await source.fetch('authored', person);
    const shepherded = await source.fetch('shepherded', person);
    const responsibleAd = await source.fetch('responsibleAd', person);
    const balloted = await source.fetch('balloted', person);
    const acknowledged = await source.fetch('acknowledged', person);

    return aggregate(
        { authored, shepherded, responsibleAd, balloted, acknowledged },
        person,
        startedAt,
        clock
    );
}
