import { type RuntimeResource } from '../lifecycle';

/** Delivers a resource link to a fixed recipient list. */
export interface Notifier extends RuntimeResource {
  notify(link: string): Promise<void>;
}
