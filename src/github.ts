import { Octokit } from '@octokit/rest';
import { CredentialsError, describeError } from './errors.js';

// the slice of the Octokit client this module talks to
export interface AuthenticatedUserApi {
	rest: {
		users: {
			getAuthenticated(): Promise<{ data: { login: string } }>;
		};
	};
}

export class GithubAccount {
	private octokit: AuthenticatedUserApi;

	constructor(token: string, octokit?: AuthenticatedUserApi) {
		this.octokit = octokit ?? new Octokit({ auth: token, userAgent: 'branch-watch' });
	}

	/**
	 * Checks that the token authenticates as `user` before it is stored.
	 * Returns the canonical login as reported by GitHub.
	 */
	public async verify(user: string): Promise<string> {
		let login: string;
		try {
			const response = await this.octokit.rest.users.getAuthenticated();
			login = response.data.login;
		} catch (error) {
			throw new CredentialsError(`GitHub rejected the token: ${describeError(error)}`);
		}

		if (login.toLowerCase() !== user.toLowerCase()) {
			throw new CredentialsError(`Token belongs to "${login}", not "${user}"`);
		}
		return login;
	}
}
