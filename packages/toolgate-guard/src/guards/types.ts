/**
 * @toolgate/guard - Guard Types
 *
 * Base class shared by the command and path guards.
 */

import { allowDecision, denyDecision, type Decision, type Severity } from '@toolgate/core';

/**
 * Guard interface
 */
export interface Guard {
  /** Guard name for identification and logging */
  name(): string;
}

/**
 * Base class for guards with common functionality
 */
export abstract class BaseGuard implements Guard {
  abstract name(): string;

  /**
   * Helper to create an allow decision
   */
  protected allow(message?: string): Decision {
    return allowDecision({ guard: this.name(), message });
  }

  /**
   * Helper to create a deny decision
   */
  protected deny(reason: string, message: string, severity: Severity = 'high'): Decision {
    return denyDecision({ guard: this.name(), reason, message, severity });
  }
}
