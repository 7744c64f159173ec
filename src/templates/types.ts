// Template-specific types
export type TemplateName =
  | 'startup.sh'
  | 'Caddyfile'
  | 'app.service'
  | 'app-config.json'
  | 'setup-env.sh'
  | 'cloudwatch-agent.json'
  | 'logrotate.conf';

export type TemplateVariables = Readonly<Record<string, string | number>>;

export interface TemplateSource {
  read(name: TemplateName): string;
}
