// Tests must not depend on the developer's editor, agent or terminal colours.
delete process.env.EDITOR;
delete process.env.REVIEW_THREADS_AGENT;
process.env.FORCE_COLOR = '0';
