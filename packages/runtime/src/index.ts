export { runJob } from "./runJob";
export type {
	JobExitCode,
	JobOutcome,
	JobPaths,
	RunJobOptions,
} from "./runJob";
