/**
 * Seed data for development/demo purposes.
 *
 * Projects, issues and comments refer to users and projects by username
 * and title; the seed script resolves them to ids as it inserts parents
 * first.
 */

import type { IssuePriority, IssueStatus, IssueTag, ProjectType } from "@issuedesk/contracts";

export interface SeedData {
  users: { username: string; email: string; age?: number; canBeContacted?: boolean; canDataBeShared?: boolean }[];
  projects: { title: string; description: string; type: ProjectType; author: string; contributors: string[] }[];
  issues: {
    title: string;
    description: string;
    priority: IssuePriority;
    tag: IssueTag;
    status: IssueStatus;
    project: string;
    author: string;
    assignee?: string;
  }[];
  comments: { description: string; issue: string; author: string }[];
}

export const seedData: SeedData = {
  users: [
    { username: "ada", email: "ada@example.com", age: 36, canBeContacted: true, canDataBeShared: true },
    { username: "grace", email: "grace@example.com", age: 45 },
    { username: "linus", email: "linus@example.com", canDataBeShared: true },
  ],
  projects: [
    {
      title: "Tracker API",
      description: "The issue tracker's HTTP API.",
      type: "BACKEND",
      author: "ada",
      contributors: ["grace"],
    },
    {
      title: "Tracker iOS",
      description: "Native client for iPhone.",
      type: "IOS",
      author: "grace",
      contributors: ["linus"],
    },
  ],
  issues: [
    {
      title: "Paginate comment lists",
      description: "Long threads load slowly.",
      priority: "MEDIUM",
      tag: "FEATURE",
      status: "IN_PROGRESS",
      project: "Tracker API",
      author: "ada",
      assignee: "grace",
    },
    {
      title: "Crash on empty project",
      description: "Opening a project without issues crashes the app.",
      priority: "HIGH",
      tag: "BUG",
      status: "TODO",
      project: "Tracker iOS",
      author: "linus",
    },
  ],
  comments: [
    { description: "Reproduced on the latest build.", issue: "Crash on empty project", author: "grace" },
    { description: "Cursor paging would suit this.", issue: "Paginate comment lists", author: "grace" },
  ],
};
