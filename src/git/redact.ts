const CREDENTIAL_RE = /([a-z][a-z0-9+.-]*:\/\/)([^/@\s]+)@/gi;

/** Hide the userinfo part of every URL in `text` (tokens in HTTPS remotes). */
export const redactCredentials = (text: string) =>
	text.replace(CREDENTIAL_RE, (_match, scheme: string, userinfo: string) =>
		userinfo.includes(":") ? `${scheme}*****:*****@` : `${scheme}***@`,
	);
