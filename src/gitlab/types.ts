/** Subsets of GitLab REST v4 payloads that the adapter reads. */

export interface GitLabGroup {
  id: number;
  name: string;
  path: string;
  full_path: string;
  description: string | null;
  parent_id: number | null;
}

export interface GitLabProject {
  id: number;
  name: string;
  path: string;
  path_with_namespace: string;
  description: string | null;
  namespace?: { id: number };
  empty_repo?: boolean;
}

export interface GitLabLabel {
  id: number;
  name: string;
  color: string;
  description: string | null;
  /** Present on project label lists; false for labels inherited from a group */
  is_project_label?: boolean;
}

export interface GitLabMilestone {
  id: number;
  iid: number;
  title: string;
  description: string | null;
  state: "active" | "closed";
  group_id?: number;
  project_id?: number;
}

export interface GitLabIteration {
  id: number;
  iid: number;
  title: string | null;
  description: string | null;
  state: number;
  group_id: number;
}

export interface GitLabEpic {
  id: number;
  iid: number;
  group_id: number;
  parent_id: number | null;
  title: string;
  description: string | null;
  state: "opened" | "closed";
  labels: string[];
}

export interface GitLabUserRef {
  id: number;
  username: string;
}

export interface GitLabIssue {
  id: number;
  iid: number;
  project_id: number;
  title: string;
  description: string | null;
  state: "opened" | "closed";
  labels: string[];
  milestone: { id: number } | null;
  iteration?: { id: number } | null;
  epic?: { id: number } | null;
  assignees?: GitLabUserRef[];
  weight?: number | null;
}

export interface GitLabMember {
  id: number;
  username: string;
  access_level: number;
}
