import type { GroupPolicy } from './types';
import { policy as min } from './min';
import { policy as mul } from './mul';
import { policy as sum } from './sum';

export * from './types';

export const policies: GroupPolicy[] = [min, mul, sum];

export const getPolicy = (name: string): GroupPolicy | undefined =>
    policies.find((p) => p.name === name);
