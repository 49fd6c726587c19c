/**
 * Built-in workflow templates
 *
 * @module templates
 */

import { CONDITION_OPERATORS } from '../nodes/NodeConfigSchemas.js';
import { createWorkflow, slugify } from '../builder/WorkflowBuilder.js';
import { TemplateLibrary, type WorkflowTemplate } from './TemplateLibrary.js';

const JOIN_POLICIES = ['fail_fast', 'tolerate_partial'] as const;

// ============================================================================
// PROCESS
// ============================================================================

export const sequentialTemplate: WorkflowTemplate = {
  name: 'sequential',
  title: 'Sequential Tasks',
  description: 'Runs a list of agent tasks one after another',
  category: 'process',
  parameters: {
    steps: { type: 'array', required: true, description: 'Task descriptions, in order' },
    agent: { type: 'string', default: 'general', description: 'Agent that executes every step' },
    name: { type: 'string', default: 'Sequential Tasks', description: 'Workflow name' },
  },
  build(args) {
    const steps = args.strings('steps', true);
    const agent = args.string('agent');
    const builder = createWorkflow(args.string('name'), { metadata: { template: 'sequential' } }).start();

    const ids = steps.map((task, index) => {
      const id = `step_${index + 1}`;
      builder.agentExecute(id, { task, agent });
      return id;
    });

    return builder.end().chain('start', ...ids, 'end').build();
  },
};

export const fanOutCollectTemplate: WorkflowTemplate = {
  name: 'fan_out_collect',
  title: 'Fan Out and Collect',
  description: 'Runs agent tasks in parallel and collects their outputs',
  category: 'process',
  parameters: {
    tasks: { type: 'array', required: true, description: 'Task descriptions, one branch each' },
    agent: { type: 'string', default: 'general', description: 'Agent for every branch' },
    failurePolicy: {
      type: 'string',
      default: 'fail_fast',
      description: 'JOIN policy: "fail_fast" or "tolerate_partial" (branches become optional)',
    },
  },
  build(args) {
    const tasks = args.strings('tasks', true);
    const agent = args.string('agent');
    const failurePolicy = args.oneOf('failurePolicy', JOIN_POLICIES);
    const tolerant = failurePolicy === 'tolerate_partial';

    const builder = createWorkflow('Fan Out and Collect', { metadata: { template: 'fan_out_collect' } })
      .start()
      .parallel('fork', { joinGroup: 'branches' })
      .join('collect', { joinGroup: 'branches', failurePolicy })
      .end()
      .chain('start', 'fork');

    const ids = tasks.map((task, index) => {
      const id = `branch_${index + 1}`;
      builder.agentExecute(id, { task, agent }, { optional: tolerant }).chain('fork', id, 'collect');
      return id;
    });

    if (tolerant) {
      return builder.chain('collect', 'end').build();
    }

    return builder
      .transform('gather', {
        inputs: ids.map(id => `${id}_output`),
        operation: 'collect',
        output: 'results',
      })
      .chain('collect', 'gather', 'end')
      .build();
  },
};

export const approvalGateTemplate: WorkflowTemplate = {
  name: 'approval_gate',
  title: 'Approval Gate',
  description: 'Prepares a result, waits for a human approval, then applies it',
  category: 'process',
  parameters: {
    task: { type: 'string', required: true, description: 'Work to prepare for approval' },
    followUp: { type: 'string', default: 'Apply the approved result', description: 'Task run after approval' },
    message: { type: 'string', default: 'Approve to continue', description: 'Prompt shown to approvers' },
    approvers: { type: 'array', default: [], description: 'Allowed approvers' },
  },
  build(args) {
    return createWorkflow('Approval Gate', { metadata: { template: 'approval_gate' } })
      .start()
      .agentExecute('prepare', { task: args.string('task') })
      .approval('review', { message: args.string('message'), approvers: args.strings('approvers') })
      .agentExecute('apply', { task: args.string('followUp') })
      .end()
      .chain('start', 'prepare', 'review', 'apply', 'end')
      .build();
  },
};

export const conditionalRoutingTemplate: WorkflowTemplate = {
  name: 'conditional_routing',
  title: 'Conditional Routing',
  description: 'Routes to one of two tasks depending on a variable',
  category: 'process',
  parameters: {
    variable: { type: 'string', required: true, description: 'Variable to test' },
    operator: { type: 'string', default: '==', description: 'Comparison operator' },
    value: { type: 'any', description: 'Value to compare against' },
    thenTask: { type: 'string', required: true, description: 'Task when the condition holds' },
    elseTask: { type: 'string', required: true, description: 'Task otherwise' },
  },
  build(args) {
    const operator = args.oneOf('operator', CONDITION_OPERATORS);
    const value = args.raw('value');
    const clause = value === undefined
      ? { variable: args.string('variable'), operator }
      : { variable: args.string('variable'), operator, value };

    return createWorkflow('Conditional Routing', { metadata: { template: 'conditional_routing' } })
      .start()
      .condition('route')
      .agentExecute('then_branch', { task: args.string('thenTask') })
      .agentExecute('else_branch', { task: args.string('elseTask') })
      .end()
      .chain('start', 'route')
      .when('route', 'then_branch', clause)
      .otherwise('route', 'else_branch')
      .chain('then_branch', 'end')
      .chain('else_branch', 'end')
      .build();
  },
};

// ============================================================================
// DEVELOPMENT
// ============================================================================

export const iterativeRefinementTemplate: WorkflowTemplate = {
  name: 'iterative_refinement',
  title: 'Iterative Refinement',
  description: 'Drafts and scores a result until the score reaches a threshold',
  category: 'development',
  parameters: {
    task: { type: 'string', required: true, description: 'What to produce' },
    maxIterations: { type: 'number', default: 3, description: 'Upper bound on refinement rounds' },
    threshold: { type: 'number', default: 0.8, description: 'Score that ends the loop' },
    scoreVariable: { type: 'string', default: 'quality', description: 'Variable the scorer writes' },
  },
  build(args) {
    const score = args.string('scoreVariable');
    return createWorkflow('Iterative Refinement', { metadata: { template: 'iterative_refinement' } })
      .start()
      .loop('refine', {
        body: 'draft',
        maxIterations: args.number('maxIterations'),
        condition: {
          any: [
            { variable: score, operator: 'not_exists' },
            { variable: score, operator: '<', value: args.number('threshold') },
          ],
        },
      })
      .agentExecute('draft', { task: args.string('task'), outputKey: 'draft' })
      .agentExecute('score', { task: 'Score the current draft from 0 to 1', agent: 'reviewer', outputKey: score })
      .end()
      .chain('start', 'refine', 'draft', 'score')
      .loopBack('score', 'refine')
      .chain('refine', 'end')
      .build();
  },
};

export const codeReviewTemplate: WorkflowTemplate = {
  name: 'code_review',
  title: 'Code Review',
  description: 'Fetches a pull request, reviews it against each criterion in parallel and asks for sign-off',
  category: 'development',
  parameters: {
    repositoryUrl: { type: 'string', required: true, description: 'Git repository URL' },
    pullRequestId: { type: 'string', required: true, description: 'Pull request id' },
    criteria: {
      type: 'array',
      default: ['code_quality', 'security', 'performance'],
      description: 'Review criteria, one reviewer branch each',
    },
    approvers: { type: 'array', default: [], description: 'Who may sign off' },
  },
  build(args) {
    const pullRequestId = args.string('pullRequestId');
    const criteria = args.strings('criteria', true);

    const builder = createWorkflow(`Code Review: ${pullRequestId}`, {
      metadata: { template: 'code_review' },
      variables: { repository_url: args.string('repositoryUrl'), pull_request_id: pullRequestId },
    })
      .start()
      .mcpCall('fetch', {
        target: 'git.fetch_pull_request',
        payload: { repository: '{{repository_url}}', pullRequest: '{{pull_request_id}}' },
        outputKey: 'pull_request',
      })
      .parallel('fan_out', { joinGroup: 'reviews' })
      .join('gather', { joinGroup: 'reviews', failurePolicy: 'fail_fast' })
      .chain('start', 'fetch', 'fan_out');

    const ids = criteria.map(criterion => {
      const id = `review_${slugify(criterion)}`;
      builder
        .agentExecute(id, { task: `Review the pull request for ${criterion}`, agent: 'reviewer' })
        .chain('fan_out', id, 'gather');
      return id;
    });

    return builder
      .transform('summary', { inputs: ids.map(id => `${id}_output`), operation: 'collect', output: 'review_summary' })
      .approval('sign_off', { message: `Sign off pull request ${pullRequestId}`, approvers: args.strings('approvers') })
      .end()
      .chain('gather', 'summary', 'sign_off', 'end')
      .build();
  },
};

export const bugFixTemplate: WorkflowTemplate = {
  name: 'bug_fix',
  title: 'Bug Fix',
  description: 'Reproduces, fixes and verifies a bug; escalates to a human when verification fails',
  category: 'development',
  parameters: {
    bugDescription: { type: 'string', required: true, description: 'Description of the bug' },
    severity: { type: 'string', default: 'medium', description: 'low, medium, high or critical' },
    includeRootCause: { type: 'boolean', default: true, description: 'Add a root cause analysis step' },
  },
  build(args) {
    const bug = args.string('bugDescription');
    const severity = args.oneOf('severity', ['low', 'medium', 'high', 'critical'] as const);

    const builder = createWorkflow('Bug Fix', {
      metadata: { template: 'bug_fix', severity },
      variables: { severity },
    })
      .start()
      .agentExecute('reproduce', { task: `Reproduce: ${bug}` })
      .agentExecute('fix', { task: `Fix: ${bug}`, agent: 'developer' })
      .agentExecute('verify', { task: 'Verify the fix; return true when it holds', agent: 'qa', outputKey: 'verified' })
      .condition('check')
      .approval('escalate', { message: `Fix for "${bug}" could not be verified` })
      .end();

    if (args.boolean('includeRootCause')) {
      builder.agentExecute('root_cause', { task: `Find the root cause of: ${bug}` }).chain('start', 'reproduce', 'root_cause', 'fix');
    } else {
      builder.chain('start', 'reproduce', 'fix');
    }

    return builder
      .chain('fix', 'verify', 'check')
      .when('check', 'end', 'verified == true')
      .otherwise('check', 'escalate')
      .chain('escalate', 'end')
      .build();
  },
};

/**
 * Plan, build, optionally test and document, then wait for sign-off before deploying.
 * Each phase spawns its agent first and then hands it the work.
 */
export const softwareDevelopmentTemplate: WorkflowTemplate = {
  name: 'software_development',
  title: 'Software Development',
  description: 'Takes a project from requirements through planning, implementation, testing and documentation to deployment',
  category: 'development',
  parameters: {
    projectName: { type: 'string', required: true, description: 'Name of the project' },
    requirements: { type: 'string', required: true, description: 'What the project must do' },
    targetLanguage: { type: 'string', default: 'typescript', description: 'Implementation language' },
    includeTests: { type: 'boolean', default: true, description: 'Add a testing phase' },
    includeDocs: { type: 'boolean', default: true, description: 'Add a documentation phase' },
    deploymentTarget: { type: 'string', default: 'local', description: 'Where the result is deployed' },
  },
  build(args) {
    const project = args.string('projectName');
    const requirements = args.string('requirements');
    const language = args.string('targetLanguage');
    const includeTests = args.boolean('includeTests');
    const includeDocs = args.boolean('includeDocs');
    const target = args.string('deploymentTarget');

    const builder = createWorkflow(`Develop ${project}`, {
      metadata: { template: 'software_development', deploymentTarget: target },
      variables: { projectName: project, requirements, targetLanguage: language, includeTests, includeDocs },
    })
      .start()
      .agentSpawn('spawn_architect', { agent: 'architect' })
      .agentExecute('planning_phase', {
        task: `Design the architecture of ${project} in ${language}. Requirements: ${requirements}`,
        agent: 'architect',
        outputKey: 'architecture',
      })
      .agentSpawn('spawn_developer', { agent: 'developer' })
      .agentExecute('implementation_phase', {
        task: `Implement ${project} following the planned architecture`,
        agent: 'developer',
        inputs: ['architecture'],
        outputKey: 'implementation',
      });

    const path = ['start', 'spawn_architect', 'planning_phase', 'spawn_developer', 'implementation_phase'];

    if (includeTests) {
      builder
        .agentSpawn('spawn_qa', { agent: 'qa' })
        .agentExecute('testing_phase', {
          task: `Write and run tests for ${project}`,
          agent: 'qa',
          inputs: ['implementation'],
          outputKey: 'test_report',
        });
      path.push('spawn_qa', 'testing_phase');
    }

    if (includeDocs) {
      builder
        .agentSpawn('spawn_writer', { agent: 'writer' })
        .agentExecute('documentation_phase', {
          task: `Document ${project}`,
          agent: 'writer',
          inputs: ['architecture', 'implementation'],
          outputKey: 'documentation',
        });
      path.push('spawn_writer', 'documentation_phase');
    }

    return builder
      .agentExecute('deployment_prep', {
        task: `Prepare ${project} for deployment to ${target}`,
        agent: 'developer',
        inputs: ['implementation'],
      })
      .approval('deployment_approval', { message: `Deploy ${project} to ${target}?` })
      .end()
      .chain(...path, 'deployment_prep', 'deployment_approval', 'end')
      .build();
  },
};

// ============================================================================
// RESEARCH / DOCUMENTATION / DATA
// ============================================================================

export const researchAnalysisTemplate: WorkflowTemplate = {
  name: 'research_analysis',
  title: 'Research Analysis',
  description: 'Researches a topic across sources in parallel and synthesises what arrived',
  category: 'research',
  parameters: {
    topic: { type: 'string', required: true, description: 'Research topic' },
    sources: { type: 'array', default: ['web', 'papers'], description: 'Source kinds, one branch each' },
    depth: { type: 'string', default: 'standard', description: 'quick, standard or deep' },
  },
  build(args) {
    const topic = args.string('topic');
    const depth = args.oneOf('depth', ['quick', 'standard', 'deep'] as const);
    const sources = args.strings('sources', true);

    const builder = createWorkflow(`Research Analysis: ${topic}`, {
      metadata: { template: 'research_analysis' },
      variables: { topic, depth },
    })
      .start()
      .agentExecute('plan', { task: `Plan a ${depth} research of ${topic}`, agent: 'researcher' })
      .parallel('fan_out', { joinGroup: 'sources' })
      .join('gather', { joinGroup: 'sources', failurePolicy: 'tolerate_partial' })
      .chain('start', 'plan', 'fan_out');

    const ids = sources.map(source => {
      const id = `research_${slugify(source)}`;
      builder
        .agentExecute(id, { task: `Research ${topic} using ${source}`, agent: 'researcher' }, { optional: true })
        .chain('fan_out', id, 'gather');
      return id;
    });

    return builder
      .agentExecute('synthesize', { task: `Synthesise findings on ${topic}`, agent: 'analyst', inputs: ids.map(id => `${id}_output`) })
      .end()
      .chain('gather', 'synthesize', 'end')
      .build();
  },
};

export const apiDocumentationTemplate: WorkflowTemplate = {
  name: 'api_documentation',
  title: 'API Documentation',
  description: 'Analyses an API, drafts documentation, formats it and asks for review',
  category: 'documentation',
  parameters: {
    apiName: { type: 'string', required: true, description: 'API name' },
    audience: { type: 'string', default: 'developers', description: 'Intended readers' },
  },
  build(args) {
    const apiName = args.string('apiName');
    return createWorkflow(`API Documentation: ${apiName}`, {
      metadata: { template: 'api_documentation' },
      variables: { api_name: apiName, audience: args.string('audience') },
    })
      .start()
      .agentExecute('analyze', { task: `Analyse the ${apiName} API surface`, agent: 'analyst' })
      .agentExecute('write', { task: `Document ${apiName} for ${args.string('audience')}`, agent: 'writer', outputKey: 'docs_draft' })
      .transform('format', {
        inputs: ['docs_draft'],
        operation: 'format',
        output: 'documentation',
        options: { template: '# {{api_name}}\n\n{{docs_draft}}' },
      })
      .approval('review', { message: `Review documentation for ${apiName}` })
      .end()
      .chain('start', 'analyze', 'write', 'format', 'review', 'end')
      .build();
  },
};

export const dataProcessingPipelineTemplate: WorkflowTemplate = {
  name: 'data_processing_pipeline',
  title: 'Data Processing Pipeline',
  description: 'Extracts data from a service, runs processing stages and delivers the result',
  category: 'data',
  parameters: {
    source: { type: 'string', required: true, description: 'Service target to extract from' },
    destination: { type: 'string', required: true, description: 'Webhook target to deliver to' },
    stages: { type: 'array', default: ['clean', 'transform', 'validate'], description: 'Processing stages in order' },
  },
  build(args) {
    const stages = args.strings('stages', true);
    const builder = createWorkflow('Data Processing Pipeline', { metadata: { template: 'data_processing_pipeline' } })
      .start()
      .mcpCall('extract', { target: args.string('source'), outputKey: 'raw_data' });

    let previous = 'raw_data';
    const ids = stages.map(stage => {
      const id = `stage_${slugify(stage)}`;
      builder.agentExecute(id, { task: `Run the ${stage} stage`, agent: 'data', inputs: [previous] });
      previous = `${id}_output`;
      return id;
    });

    return builder
      .webhook('load', {
        target: args.string('destination'),
        method: 'POST',
        payload: { data: `{{${previous}}}` },
        outputKey: 'load_result',
      })
      .end()
      .chain('start', 'extract', ...ids, 'load', 'end')
      .build();
  },
};

export const BUILTIN_TEMPLATES: readonly WorkflowTemplate[] = [
  sequentialTemplate,
  fanOutCollectTemplate,
  approvalGateTemplate,
  conditionalRoutingTemplate,
  iterativeRefinementTemplate,
  codeReviewTemplate,
  bugFixTemplate,
  softwareDevelopmentTemplate,
  researchAnalysisTemplate,
  apiDocumentationTemplate,
  dataProcessingPipelineTemplate,
];

/**
 * Library with every built-in template registered
 */
export function createDefaultTemplateLibrary(): TemplateLibrary {
  const library = new TemplateLibrary();
  for (const template of BUILTIN_TEMPLATES) {
    library.register(template);
  }
  return library;
}
