import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { KeyedTtlCache, type Clock } from "../lib/cache/ttlCache.js";
import {
  GITHUB_API_BASE,
  GITHUB_API_VERSION,
  REPOSITORY_CACHE_TTL_MS,
  REQUEST_TIMEOUT_MS,
} from "../config/github.js";

export interface IGithubRelease {
  tagName: string;
  htmlUrl: string;
}

export interface IGithubCommitSummary {
  sha: string;
  htmlUrl: string;
  message: string;
  /** Login, else the commit author's name, else "Unknown". */
  author: string;
}

export interface IGithubComparison {
  totalCommits: number;
  htmlUrl: string;
  commits: IGithubCommitSummary[];
}

export interface IGithubIssueResult {
  number: number;
  htmlUrl: string;
}

export interface IGithubRepository {
  htmlUrl: string;
}

export interface IGithubClient {
  listReleases(owner: string, repo: string, limit: number): Promise<IGithubRelease[]>;
  compareCommits(owner: string, repo: string, base: string, head: string): Promise<IGithubComparison>;
  createIssue(
    owner: string,
    repo: string,
    title: string,
    body: string,
    labels: readonly string[],
  ): Promise<IGithubIssueResult>;
  getRepository(owner: string, repo: string): Promise<IGithubRepository>;
}

type RawRelease = {
  tag_name?: string;
  html_url?: string;
};

type RawCommit = {
  sha?: string;
  html_url?: string;
  author?: { login?: string } | null;
  commit?: {
    message?: string;
    author?: { name?: string } | null;
  };
};

type RawComparison = {
  total_commits?: number;
  html_url?: string;
  commits?: RawCommit[];
};

type RawIssue = {
  number?: number;
  html_url?: string;
};

type RawRepository = {
  html_url?: string;
};

const toRelease = (raw: RawRelease): IGithubRelease => {
  return {
    tagName: raw.tag_name ?? "",
    htmlUrl: raw.html_url ?? "",
  };
};

const toCommitSummary = (raw: RawCommit): IGithubCommitSummary => {
  return {
    sha: raw.sha ?? "",
    htmlUrl: raw.html_url ?? "",
    message: raw.commit?.message ?? "",
    author: raw.author?.login || raw.commit?.author?.name || "Unknown",
  };
};

const toComparison = (raw: RawComparison): IGithubComparison => {
  return {
    totalCommits: raw.total_commits ?? 0,
    htmlUrl: raw.html_url ?? "",
    commits: Array.isArray(raw.commits) ? raw.commits.map(toCommitSummary) : [],
  };
};

const toRepository = (raw: RawRepository): IGithubRepository => {
  return {
    htmlUrl: raw.html_url ?? "",
  };
};

const repoPath = (owner: string, repo: string): string => {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
};

export interface IGithubRestClientOptions {
  token: string;
  baseUrl?: string;
  /** Replaces the HTTP transport; tests answer requests in process. */
  adapter?: AxiosAdapter;
  now?: Clock;
}

export class GithubRestClient implements IGithubClient {
  private readonly http: AxiosInstance;
  private readonly repositories: KeyedTtlCache<IGithubRepository>;

  constructor(options: IGithubRestClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl ?? GITHUB_API_BASE,
      timeout: REQUEST_TIMEOUT_MS,
      adapter: options.adapter,
      headers: {
        Authorization: `Bearer ${options.token}`,
        Accept: "application/vnd.github+json",
        "X-GitHub-Api-Version": GITHUB_API_VERSION,
      },
    });
    this.repositories = new KeyedTtlCache<IGithubRepository>(REPOSITORY_CACHE_TTL_MS, {
      now: options.now,
    });
  }

  async listReleases(owner: string, repo: string, limit: number): Promise<IGithubRelease[]> {
    const response = await this.http.get<RawRelease[]>(`${repoPath(owner, repo)}/releases`, {
      params: { per_page: limit },
    });
    return Array.isArray(response.data) ? response.data.map(toRelease) : [];
  }

  async compareCommits(
    owner: string,
    repo: string,
    base: string,
    head: string,
  ): Promise<IGithubComparison> {
    const range = `${encodeURIComponent(base)}...${encodeURIComponent(head)}`;
    const response = await this.http.get<RawComparison>(`${repoPath(owner, repo)}/compare/${range}`);
    return toComparison(response.data);
  }

  async createIssue(
    owner: string,
    repo: string,
    title: string,
    body: string,
    labels: readonly string[],
  ): Promise<IGithubIssueResult> {
    console.log(`[GitHub API] Creating issue in ${owner}/${repo}`);
    console.log(`[GitHub API] Title: ${title}`);
    console.log(`[GitHub API] Labels: ${labels.join(", ")}`);

    const response = await this.http.post<RawIssue>(`${repoPath(owner, repo)}/issues`, {
      title,
      body,
      ...(labels.length ? { labels: [...labels] } : {}),
    });

    const { number, html_url: htmlUrl } = response.data;
    if (typeof number !== "number" || !htmlUrl) {
      throw new Error(`GitHub returned an incomplete issue for ${owner}/${repo}.`);
    }
    return { number, htmlUrl };
  }

  async getRepository(owner: string, repo: string): Promise<IGithubRepository> {
    return this.repositories.getOrFetch(`${owner}/${repo}`, async () => {
      const response = await this.http.get<RawRepository>(repoPath(owner, repo));
      return toRepository(response.data);
    });
  }
}
