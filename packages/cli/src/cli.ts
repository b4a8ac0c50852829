#!/usr/bin/env node
/**
 * istio-beacon CLI - Charm entrypoint and offline renderer
 *
 * Commands:
 *   dispatch    - Run the current Juju hook (used by the charm's dispatch script)
 *   render      - Print waypoint, HPA and AuthorizationPolicies as YAML
 */
import { Command, Option } from 'commander';
import { errorMessage } from 'istio-beacon';
import { dispatch, type DispatchOptions } from './commands/dispatch';
import { render, type RenderOptions } from './commands/render';

const program = new Command();

program
  .name('istio-beacon')
  .description('istio-beacon - Istio ambient mesh beacon charm for Juju')
  .version('0.1.0');

program
  .command('dispatch')
  .description('Run the hook named by JUJU_DISPATCH_PATH')
  .addOption(new Option('-c, --charm <charm>', 'Charm to run').choices(['beacon', 'mesh-tester']).default('beacon'))
  .action(async (opts: DispatchOptions) => {
    try {
      await dispatch(opts);
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('render')
  .description('Render waypoint and policy manifests')
  .option('-f, --values <file>', 'YAML values file (app, model, replicas, modelOnMesh, policies)')
  .option('-o, --output <file>', 'Output file (defaults to stdout)')
  .action(async (opts: RenderOptions) => {
    try {
      await render(opts);
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program.parse();
