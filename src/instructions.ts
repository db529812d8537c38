export const INSTRUCTIONS = `
# Problem Ledger

You have access to the team's competitive-programming ledger via MCP tools:

- **Problems:** \`list_problems\`, \`get_problem\`, \`create_problem\`, \`update_problem\`, \`delete_problem\`
- **Solutions:** \`get_solution\`, \`put_solution\`, \`delete_solution\` (one Markdown write-up per problem)
- **Contests:** \`list_contests\`, \`get_contest\`, \`create_contest\`, \`update_contest\`, \`delete_contest\`
- **Bulk:** \`export_problems\`, \`import_problems\` (import replaces everything; a backup is kept)
- **Sync:** \`sync_status\`, \`sync_init\`, \`sync_pull\`, \`sync_push\` (git)

## Problems

- A problem is either solved or, if unsolved, may carry an \`unsolved_stage\`
  (\`unseen\`, \`seen_no_idea\`, \`knows_approach_not_implemented\`) and a free-text
  \`unsolved_custom_label\`. Marking it solved clears both.
- \`update_problem\` replaces the whole record. Fetch it with \`get_problem\` first and
  send every field you want to keep.
- \`has_solution\` is computed from the stored write-up; it cannot be set directly.

## Contests

- \`total_problems\` is 1-15. Problems are lettered A, B, C, ... by position and the
  list always has exactly \`total_problems\` entries.

## Syncing with the team

- First time: \`sync_init\` with the URL of an empty remote repository.
- Before working: \`sync_pull\`. After working: \`sync_push\` with a short message.
- Every sync tool returns the raw git transcript. When a step fails, show the
  transcript to the user rather than retrying blindly.
`.trim();
