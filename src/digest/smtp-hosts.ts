// pattern: Functional Core

export type SmtpHost = Readonly<{
  host: string;
  port: number;
  secure: boolean;
}>;

/**
 * Submission host per sender domain suffix. Every entry, the default
 * included, uses implicit TLS on port 465.
 */
export const SMTP_HOSTS: ReadonlyArray<
  Readonly<{ suffix: string; host: string }>
> = [
  { suffix: "qq.com", host: "smtp.qq.com" },
  { suffix: "foxmail.com", host: "smtp.qq.com" },
  { suffix: "gmail.com", host: "smtp.gmail.com" },
  { suffix: "googlemail.com", host: "smtp.gmail.com" },
];

/** Used when no suffix in {@link SMTP_HOSTS} matches. */
export const DEFAULT_SMTP_HOST = "smtp.163.com";

export const SMTP_PORT = 465;

function domainOf(address: string): string {
  const at = address.lastIndexOf("@");
  return address.slice(at + 1).trim().toLowerCase();
}

function matchesSuffix(domain: string, suffix: string): boolean {
  return domain === suffix || domain.endsWith(`.${suffix}`);
}

/**
 * Picks the submission host for a sender address. A suffix matches the whole
 * domain or any subdomain of it, so `vip.qq.com` maps like `qq.com`.
 */
export function resolveSmtpHost(sender: string): SmtpHost {
  const domain = domainOf(sender);
  const entry = SMTP_HOSTS.find(({ suffix }) => matchesSuffix(domain, suffix));

  return {
    host: entry?.host ?? DEFAULT_SMTP_HOST,
    port: SMTP_PORT,
    secure: true,
  };
}
