import type { Command } from 'commander';
import { action, CliError, requireCredentials, type CommandContext } from './common.js';

interface LoginOptions {
  email?: string;
  token?: string;
}

export function registerAuthCommands(program: Command, ctx: CommandContext): void {
  program
    .command('login')
    .description('Store credentials after checking them against the API')
    .option('-e, --email <email>', 'account email')
    .option('-t, --token <token>', 'API token (prompted for when omitted)')
    .action(action(ctx, async (options: LoginOptions) => {
      const email = options.email ?? (await ctx.prompter.ask('Email'));
      const token = options.token ?? (await ctx.prompter.ask('API token', { secret: true }));

      const organizations = await ctx.createClient({ email, token }).fetchOrganizations();
      ctx.settings.setCredentials({ email, token });

      if (ctx.output.json) {
        ctx.output.printJson({ email, organizations });
        return;
      }
      ctx.output.success(
        `Logged in as ${email}. You have access to ${organizations.length} organization(s).`
      );
      if (!ctx.settings.getOrganizationId()) {
        ctx.output.text("Select one with 'favro org select <organization>'.");
      }
    }));

  program
    .command('logout')
    .description('Forget stored credentials and selections')
    .action(action(ctx, async () => {
      requireCredentials(ctx);
      ctx.settings.clearCredentials();
      ctx.output.success('Logged out.');
    }));

  program
    .command('whoami')
    .description('Show the logged-in user')
    .action(action(ctx, async () => {
      const credentials = requireCredentials(ctx);
      const organizationId = ctx.settings.getOrganizationId();

      // Without an organization only the account itself is known
      if (!organizationId) {
        const organizations = await ctx.createClient(credentials).fetchOrganizations();
        if (ctx.output.json) {
          ctx.output.printJson({ email: credentials.email, organizations });
          return;
        }
        ctx.output.panel('Logged in', [
          ['Email', credentials.email],
          ['Organizations', organizations.map((org) => org.name).join(', ')],
        ]);
        return;
      }

      const users = await ctx.createClient(credentials, organizationId).fetchUsers();
      const email = credentials.email.toLowerCase();
      const user = users.find((candidate) => candidate.email.toLowerCase() === email);
      if (!user) {
        throw new CliError(`No user with email ${credentials.email} in the selected organization.`);
      }

      if (ctx.output.json) {
        ctx.output.printJson(user);
        return;
      }
      ctx.output.panel(user.name, [
        ['User ID', user.userId],
        ['Email', user.email],
        ['Role', user.organizationRole],
        ['Organization', organizationId],
      ]);
    }));
}
