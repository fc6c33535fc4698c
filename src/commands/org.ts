import type { Command } from 'commander';
import { createResolvers } from '../resolvers/index.js';
import {
  action,
  CliError,
  connect,
  reportFailure,
  requireCredentials,
  requireOrganizationId,
  type CommandContext,
} from './common.js';

export function registerOrgCommands(program: Command, ctx: CommandContext): void {
  const org = program.command('org').description('Organizations');

  org
    .command('list')
    .description('List organizations the account belongs to')
    .action(action(ctx, async () => {
      const organizations = await ctx.createClient(requireCredentials(ctx)).fetchOrganizations();

      if (ctx.output.json) {
        ctx.output.printJson(organizations);
        return;
      }
      const current = ctx.settings.getOrganizationId();
      ctx.output.table(organizations, [
        ['', (o) => (o.organizationId === current ? '*' : '')],
        ['ID', (o) => o.organizationId],
        ['Name', (o) => o.name],
      ], 'Organizations');
    }));

  org
    .command('select')
    .description('Make an organization the default for later commands')
    .argument('<organization>', 'organization ID or name')
    .action(action(ctx, async (raw: string) => {
      const client = ctx.createClient(requireCredentials(ctx));
      const resolution = await createResolvers(client).organizations.resolve(raw);
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const organization = resolution.entity;
      ctx.settings.setOrganizationId(organization.organizationId);

      if (ctx.output.json) {
        ctx.output.printJson(organization);
        return;
      }
      ctx.output.success(`Selected organization: ${organization.name} (${organization.organizationId})`);
    }));

  org
    .command('current')
    .description('Show the selected organization')
    .action(action(ctx, async () => {
      const organizationId = requireOrganizationId(ctx);
      const resolution = await createResolvers(connect(ctx)).organizations.resolve(organizationId);
      if (!resolution.ok) {
        throw new CliError(
          `Selected organization ${organizationId} is no longer available.`,
          "Run 'favro org select <organization>' again."
        );
      }

      const organization = resolution.entity;
      if (ctx.output.json) {
        ctx.output.printJson(organization);
        return;
      }
      ctx.output.text(`Current organization: ${organization.name} (${organization.organizationId})`);
    }));
}
