// src/sources/github-search.ts
import { Octokit } from '@octokit/rest'

export const GITHUB_SORTS = ['stars', 'forks', 'help-wanted-issues', 'updated'] as const
export type GithubSort = typeof GITHUB_SORTS[number]

export interface SearchedRepo {
  fullName: string
  cloneUrl: string
  stars: number
  language: string | null
}

export interface RepoSearchPage {
  totalCount: number
  items: SearchedRepo[]
}

export interface RepoSearchParams {
  q: string
  sort: GithubSort
  perPage: number
  page: number
}

export interface RepoSearchClient {
  searchRepos(params: RepoSearchParams): Promise<RepoSearchPage>
  getRepo(fullName: string): Promise<SearchedRepo>
}

interface GithubRepoData {
  full_name: string
  clone_url: string
  stargazers_count: number
  language?: string | null
}

function toSearchedRepo(data: GithubRepoData): SearchedRepo {
  return {
    fullName: data.full_name,
    cloneUrl: data.clone_url,
    stars: data.stargazers_count,
    language: data.language ?? null
  }
}

/** GitHub REST search. Unauthenticated unless a token is given. */
export class OctokitSearchClient implements RepoSearchClient {
  private octokit: Octokit

  constructor(authToken?: string) {
    this.octokit = new Octokit(authToken ? { auth: authToken } : {})
  }

  async searchRepos(params: RepoSearchParams): Promise<RepoSearchPage> {
    const { data } = await this.octokit.rest.search.repos({
      q: params.q,
      sort: params.sort,
      per_page: params.perPage,
      page: params.page
    })
    return {
      totalCount: data.total_count,
      items: data.items.map(toSearchedRepo)
    }
  }

  async getRepo(fullName: string): Promise<SearchedRepo> {
    const [owner, repo] = fullName.split('/')
    const { data } = await this.octokit.rest.repos.get({ owner, repo })
    return toSearchedRepo(data)
  }
}
