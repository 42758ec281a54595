import { DEFAULT_CONFIG } from '../../config.js';
import { CommandGuard } from '../../guards/command-guard.js';
import { PathAccessGuard } from '../../guards/path-access.js';
import { loadPolicy } from '../../policy/loader.js';
import { compilePolicy } from '../../policy/policy-config.js';

export const checkCommands = {
  async command(command: string, options: { workdir?: string } = {}): Promise<void> {
    const guard = new CommandGuard();
    const verdict = guard.evaluate(command, options.workdir ?? process.cwd());

    if (verdict.status === 'blocked') {
      console.log('Decision: BLOCKED');
      console.log(`Rule: ${verdict.rule.id}`);
      console.log(`Reason: ${verdict.rule.description}`);
      console.log(`Pattern: ${verdict.rule.pattern.source}`);
      process.exit(2);
      return;
    }

    console.log('Decision: ALLOWED');
    if (verdict.override) console.log(`Override: ${verdict.override.id}`);
    if (verdict.scopedDelete) console.log('Override: project-scoped delete');
  },

  async write(target: string, options: { policy?: string; root?: string } = {}): Promise<void> {
    try {
      const policy = loadPolicy(options.policy || DEFAULT_CONFIG.policy);
      const guard = new PathAccessGuard(compilePolicy(policy, options.root));
      const verdict = guard.checkWrite(target);

      if (verdict.status === 'permit') {
        console.log('Decision: PERMIT');
        console.log(`Path: ${verdict.canonicalPath}`);
        return;
      }

      console.log('Decision: DENY');
      console.log(`Path: ${verdict.canonicalPath}`);
      console.log(`Reason: ${verdict.reason}`);
      console.log(verdict.message);
      process.exit(2);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to check write: ${message}`);
      process.exit(1);
    }
  },
};
