import type Redis from "ioredis";
import { getUsers, requireRecruiter } from "./accounts.js";
import { loadSettings } from "../config/settings.js";
import { paginate } from "./pagination.js";
import { listProfiles, viewProfile } from "./profiles.js";
import type { ProfileView } from "./profiles.js";
import { getSavedSearch, requireOwnSearch, savedSearchUrl, searchQueryOf, touchLastRun } from "./saved-searches.js";
import { lowerSet, splitCsv } from "./skills.js";
import type { JobSeekerProfile, Page, SavedCandidateSearch, User } from "./types.js";
import type { CandidateSearchQuery } from "./validation.js";

const includesLower = (haystack: string, needle: string) => haystack.toLowerCase().includes(needle);

function matchesText(profile: JobSeekerProfile, user: User, needle: string): boolean {
  return [user.firstName, user.lastName, user.username, profile.headline, profile.summary].some((h) =>
    includesLower(h, needle),
  );
}

function hasEverySkill(profile: JobSeekerProfile, wanted: string[]): boolean {
  const owned = lowerSet(profile.skills);
  return wanted.every((s) => owned.has(s.toLowerCase()));
}

/**
 * Whether a profile satisfies a saved search. Skills text behind the name
 * prefix is a free-text query, otherwise a list of skills the profile must
 * all have. A location must appear in the profile location.
 */
export function candidateMatchesSavedSearch(
  profile: JobSeekerProfile,
  user: User,
  search: Pick<SavedCandidateSearch, "skills" | "location">,
): boolean {
  const skillsText = search.skills.trim();
  const locationText = search.location.trim();

  if (skillsText.toLowerCase().startsWith("name:")) {
    const q = skillsText.slice(skillsText.indexOf(":") + 1).trim().toLowerCase();
    if (!q || !matchesText(profile, user, q)) return false;
  } else if (skillsText && !hasEverySkill(profile, splitCsv(skillsText))) {
    return false;
  }

  if (locationText && !includesLower(profile.location, locationText.toLowerCase())) return false;

  return true;
}

export interface CandidateCard extends ProfileView {
  userId: number;
}

export interface CandidateSearchResult {
  candidates: Page<CandidateCard>;
  totalCount: number;
  hasFilters: boolean;
  searchParams: { q?: string; location?: string; skills?: string };
  currentSavedSearch: SavedCandidateSearch | null;
}

export async function searchCandidates(
  r: Redis,
  recruiter: User,
  query: CandidateSearchQuery,
): Promise<CandidateSearchResult> {
  requireRecruiter(recruiter);

  const profiles = await listProfiles(r);
  const users = await getUsers(r, profiles.map((p) => p.userId));
  const q = query.q.toLowerCase();
  const location = query.location.toLowerCase();
  const skills = splitCsv(query.skills);

  const searchParams: CandidateSearchResult["searchParams"] = {};
  if (query.q) searchParams.q = query.q;
  if (query.location) searchParams.location = query.location;
  if (skills.length > 0) searchParams.skills = skills.join(", ");

  const matches: CandidateCard[] = [];
  for (const profile of profiles) {
    const user = users.get(profile.userId);
    if (!user) continue;
    if (q && !matchesText(profile, user, q)) continue;
    if (location && !includesLower(profile.location, location)) continue;
    if (skills.length > 0 && !hasEverySkill(profile, skills)) continue;
    matches.push({ userId: user.id, ...viewProfile(profile, user, { owner: false }) });
  }

  let currentSavedSearch: SavedCandidateSearch | null = null;
  const savedId = parseInt(query.savedSearch ?? "", 10);
  if (!Number.isNaN(savedId)) {
    const saved = await getSavedSearch(r, savedId);
    if (saved && saved.recruiterId === recruiter.id) {
      const now = new Date();
      await touchLastRun(r, saved, now);
      currentSavedSearch = { ...saved, lastRun: now.toISOString() };
    }
  }

  return {
    candidates: paginate(matches, query.page, loadSettings().pageSize),
    totalCount: matches.length,
    hasFilters: Boolean(query.q || query.location || skills.length > 0),
    searchParams,
    currentSavedSearch,
  };
}

export async function runSavedSearch(
  r: Redis,
  recruiter: User,
  id: number,
): Promise<{ url: string; results: CandidateSearchResult }> {
  const search = await requireOwnSearch(r, recruiter, id);
  const query = searchQueryOf(search);
  const results = await searchCandidates(r, recruiter, { ...query, savedSearch: String(search.id) });
  return { url: savedSearchUrl(search), results };
}
