export { createSmtpSender } from "./sender";
export { runBriefing } from "./orchestrator";
