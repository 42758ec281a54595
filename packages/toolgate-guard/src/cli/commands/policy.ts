import { readFileSync } from 'node:fs';

import { load as loadYaml } from 'js-yaml';

import { DEFAULT_CONFIG } from '../../config.js';
import { loadPolicy } from '../../policy/loader.js';
import { compilePolicy, describePolicyConfig } from '../../policy/policy-config.js';
import { validatePolicy } from '../../policy/validator.js';

export const policyCommands = {
  async lint(file: string): Promise<void> {
    try {
      const content = readFileSync(file, 'utf-8');
      const raw: unknown = loadYaml(content);
      const result = validatePolicy(raw);

      if (result.valid) {
        console.log('Policy is valid');
        if (result.warnings.length > 0) {
          console.log('\nWarnings:');
          result.warnings.forEach(w => console.log(`   - ${w}`));
        }
      } else {
        console.log('Policy validation failed:');
        result.errors.forEach(err => console.log(`   - ${err}`));
        process.exit(1);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to read policy file: ${message}`);
      process.exit(1);
    }
  },

  async show(options: { policy?: string; root?: string } = {}): Promise<void> {
    try {
      const policy = loadPolicy(options.policy || DEFAULT_CONFIG.policy);
      const config = compilePolicy(policy, options.root);
      console.log('Effective policy:');
      console.log(JSON.stringify(describePolicyConfig(config), null, 2));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to load policy: ${message}`);
      process.exit(1);
    }
  },
};
