export const HELP_TEXT = `Keyword Monitor - Commands

Keywords:
/keywords - list all keywords
/add <keyword> - add a keyword or pattern
/remove <number|keyword> - remove a keyword
/clear - remove all keywords

Groups:
/groups - group filter help
/whitelist add|remove|list|clear - manage the whitelist
/blacklist add|remove|list|clear - manage the blacklist

Duplicate detection:
/duplicates - show settings
/duplicates on|off - enable or disable
/duplicates hours <n> - set expiry (1-168)
/duplicates sender on|off - include the sender in the hash
/duplicates debug status - cache statistics
/duplicates clear - forget cached messages

Notification target:
/target - show the current target
/target set <value> - me, chat id, @handle or invite link
/target test - send a test notification
/target check <value> - check a target without saving it

Status:
/status - monitor status
/help - this help

Examples:
/add python - plain keyword
/add (?i)machine learning - pattern, always case-insensitive
/remove 1 - remove the first keyword
/whitelist add Python Jobs - watch only this group

Commands only work in your private chat with the monitor.`;

export const GROUPS_HELP_TEXT = `Group filters

Whitelist (watch only these groups):
/whitelist add <name or id>
/whitelist remove <number or name>
/whitelist list
/whitelist clear

Blacklist (never watch these groups):
/blacklist add <name or id>
/blacklist remove <number or name>
/blacklist list
/blacklist clear

Entries match a chat by display name (ignoring case) or by numeric id.
When the whitelist is not empty, only whitelisted groups are watched.
A group on the blacklist is never watched, even if it is also whitelisted.`;
