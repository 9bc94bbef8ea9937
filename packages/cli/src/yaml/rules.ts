import { parseDocument, isSeq, isMap, type Node } from 'yaml';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Rule entry as written to rules.yaml. Only set keys are emitted.
 */
export interface RuleEntry {
    name: string;
    match_type: string;
    match_value: string;
    match_mode?: string;
    case_sensitive?: boolean;
    priority?: number;
    assign: Record<string, string | number | boolean>;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Appends a categorization rule to a YAML file while preserving comments.
 * Handles a top-level list, a { rules: [...] } mapping and an empty file.
 */
export async function appendRuleToYaml(filePath: string, rule: RuleEntry): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            content = '# Categorization rules\nrules:\n';
            await mkdir(dirname(filePath), { recursive: true });
        } else {
            throw err;
        }
    }

    const doc = parseDocument<Node>(content || 'rules:');
    const root = doc.contents;

    if (isSeq(root)) {
        root.add(doc.createNode(rule));
    } else if (isMap(root)) {
        const rules = root.get('rules');
        if (rules === null || rules === undefined) {
            root.set('rules', doc.createNode([rule]));
        } else if (isSeq(rules)) {
            rules.add(doc.createNode(rule));
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        }
    } else {
        doc.set('rules', doc.createNode([rule]));
    }

    await writeFile(filePath, doc.toString());
}
