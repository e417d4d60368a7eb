// Separates the machine-owned region of an issue file from the operator's notes.
// Changing it orphans the notes section of every existing file.
export const USER_NOTES_MARKER = '%% USER_NOTES_START %%';

export const NO_DESCRIPTION = '_No description provided._';

export const DEFAULT_JQL =
  'assignee = currentUser() AND statusCategory != Done ORDER BY updated DESC';

export const DEFAULT_TICKETS_FOLDER = 'Jira Tickets';

export const DEFAULT_BOARD_FILE = 'My Jira Board.md';

// Lock file created in the vault root for the duration of a run
export const LOCK_FILE = '.jira-vault-sync.lock';

export const SEARCH_FIELDS = [
  'key',
  'summary',
  'description',
  'status',
  'created',
  'updated',
  'priority',
  'issuetype',
];

// Issues requested per search page
export const SEARCH_PAGE_SIZE = 50;

// Max retry attempts for API calls
export const MAX_RETRIES = 3;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 1000;
