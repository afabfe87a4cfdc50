export const explanation = `
How rn picks the file to rename:

1. The target's directory is listed; only regular files are considered, never the target itself.
2. A file is a candidate when the target is an expansion of it, or it is an expansion of the
   target: the longer name keeps the shorter one's first character and adds characters after it
   (report.csv -> report_final.csv, README -> README.md).
3. A file is also a candidate when only the extension differs (data.json -> data.yaml).
4. Exactly one candidate is renamed to the target. None, or more than one, and nothing is touched.
5. An existing target is never overwritten unless --force is given.
`;
