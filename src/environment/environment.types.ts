/**
 * Environment Types
 */

import type { ReductionResult } from '../reduction/reduction.types.js';

export type TabInfo = {
  /** Index in the context's page list */
  id: number;
  title: string;
  url: string;
  is_active: boolean;
};

/**
 * What the agent receives after setup, every step and reset.
 */
export type Observation = ReductionResult & {
  tabs: TabInfo[];
  /** Answer given with `terminate`, null until then */
  model_answer: string | null;
  terminated: boolean;
  /** Why the last action failed, null when it succeeded */
  error: string | null;
};
