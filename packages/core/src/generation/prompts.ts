/**
 * Prompt templates, one per pipeline phase. The specification is forwarded verbatim.
 */

export function manifestPrompt(spec: string): string {
  return `Read this specification and list EVERY file the system needs.

Specification:
${spec}

Answer ONLY with a JSON array of file paths relative to the project root:
["docker-compose.yml", "service/app.py", ...]

Include:
- docker-compose.yml
- every source file of every agent or service
- every Dockerfile
- every dependency list (requirements.txt and similar)
- setup scripts
- configuration files

Leave out:
- README.md and other documentation
- tests, unless the specification asks for them`;
}

export function batchPrompt(spec: string, paths: string[]): string {
  return `Using this specification, write these files:

${paths.join(', ')}

Specification:
${spec}

Every file must be COMPLETE and WORKING. Never truncate or summarize.

Answer ONLY with one JSON object, no markdown and no commentary:
{
  "path/one.py": "full content of the file",
  "path/two.txt": "full content of the file"
}

For source files:
- include every import
- write every class and function in full
- handle errors
- no placeholders such as "# rest of code" or "# implementation here"`;
}

export function gapFillPrompt(spec: string, path: string, contextPaths: string[]): string {
  const context = contextPaths.map((p) => `  - ${p}`).join('\n');
  return `Using this specification, write the file: ${path}

Specification:
${spec}

Files already written:
${context}

The file must be COMPLETE and WORKING. Never truncate.

Answer ONLY with the file content: no JSON, no markdown fences, no explanation.
Begin with the first line of the file.`;
}

export function singlePassPrompt(spec: string): string {
  return `Generate a complete system for this specification.

SPECIFICATION:
${spec}

REQUIREMENTS:
1. Write every file the system needs: docker-compose.yml, one Dockerfile and the
   sources per service, initialization scripts, and a start.sh that runs it all.
2. Emit each file in exactly this form:
   \`\`\`filename: path/to/file.ext
   [file contents]
   \`\`\`
3. Use a directory per service (service1/Dockerfile, service1/app.py).
4. Add error handling, logging and health checks.
5. Order startup with depends_on conditions.

Write the whole system now, every file in the \`\`\`filename: path\`\`\` form.`;
}

export function iteratePrompt(
  spec: string,
  modification: string,
  files: ReadonlyArray<readonly [string, string]>,
): string {
  const current = files.map(([path, content]) => `FILE: ${path}\n\`\`\`\n${content}\n\`\`\``).join('\n\n');
  return `Here are the current files of an existing system:

${current}

ORIGINAL SPECIFICATION:
${spec}

MODIFICATION REQUEST:
${modification}

Return the files that change to carry out this modification, and any new files.
Leave out files that stay the same. Use this form for each file:
\`\`\`filename: path/to/file.ext
[full updated contents]
\`\`\``;
}
