import * as path from 'path';
import type { UpdaterEvent } from './event';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Everything one updater run writes or links, derived from the event and the
 * run date. Paths inside the site repository are POSIX relative paths.
 */
export interface PagePlan {
  /** e.g. `2022/october/01/index.html` */
  newPagePath: string;
  /** e.g. `/2022/october/01`, used for the root redirect and the archive entry */
  pageParentDir: string;
  titleDate: string;
  todayDate: string;
  tomorrowDate: string;
  commitMessage: string;
  repoDir: string;
  sshKeyPath: string;
  imageKeyPrefix: string;
  asciiArtColumns: number;
  testUrl?: string;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * `DD|MM|YY`, the label format of the previous/next page links.
 */
export function formatLinkDate(date: Date): string {
  const year = date.getUTCFullYear() % 100;
  return `${pad(date.getUTCDate())}|${pad(date.getUTCMonth() + 1)}|${pad(year)}`;
}

/**
 * `DD Month YYYY`
 */
export function formatTitleDate(date: Date): string {
  return `${pad(date.getUTCDate())} ${MONTH_NAMES[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

export function formatCommitDate(date: Date): string {
  const month = MONTH_NAMES[date.getUTCMonth()].slice(0, 3);
  return `${pad(date.getUTCDate())} ${month} ${date.getUTCFullYear()}`;
}

export function pageDirForDate(date: Date): string {
  const month = MONTH_NAMES[date.getUTCMonth()].toLowerCase();
  return path.posix.join(String(date.getUTCFullYear()), month, pad(date.getUTCDate()));
}

export function planPageUpdate(event: UpdaterEvent, today: Date): PagePlan {
  const pageDir = pageDirForDate(today);
  const tomorrow = new Date(today.getTime() + ONE_DAY_MS);

  return {
    newPagePath: path.posix.join(pageDir, 'index.html'),
    pageParentDir: `/${pageDir}`,
    titleDate: formatTitleDate(today),
    todayDate: formatLinkDate(today),
    tomorrowDate: formatLinkDate(tomorrow),
    commitMessage: `Created new page for ${formatCommitDate(today)}`,
    repoDir: path.posix.join(event.temp_dir, 'jwstascii'),
    sshKeyPath: path.posix.join(event.temp_dir, 'id_rsa'),
    imageKeyPrefix: 'images/',
    asciiArtColumns: event.ascii_art_num_columns,
    testUrl: event.test_url
  };
}
