import type { RouteModule } from "../src/lib/router.js";
import * as accountsCreate from "./accounts-create.js";
import * as accountsMe from "./accounts-me.js";
import * as accountsUser from "./accounts-user.js";
import * as applicationStatus from "./application-status.js";
import * as candidates from "./candidates.js";
import * as checkCandidateMatches from "./check-candidate-matches.js";
import * as jobApplications from "./job-applications.js";
import * as jobApply from "./job-apply.js";
import * as jobDetail from "./job-detail.js";
import * as jobReport from "./job-report.js";
import * as jobWithdraw from "./job-withdraw.js";
import * as jobs from "./jobs.js";
import * as jobsMine from "./jobs-mine.js";
import * as messagesConversation from "./messages-conversation.js";
import * as messagesInbox from "./messages-inbox.js";
import * as messagesList from "./messages-list.js";
import * as messagesSend from "./messages-send.js";
import * as notificationDetail from "./notification-detail.js";
import * as notificationRead from "./notification-read.js";
import * as notifications from "./notifications.js";
import * as notificationsReadAll from "./notifications-read-all.js";
import * as notificationsUnread from "./notifications-unread.js";
import * as profileMe from "./profile-me.js";
import * as profilePublic from "./profile-public.js";
import * as recommended from "./recommended.js";
import * as recommendedJob from "./recommended-job.js";
import * as reportReview from "./report-review.js";
import * as reports from "./reports.js";
import * as savedSearchDelete from "./saved-search-delete.js";
import * as savedSearchRun from "./saved-search-run.js";
import * as savedSearchToggle from "./saved-search-toggle.js";
import * as savedSearches from "./saved-searches.js";

/** Every endpoint the server exposes */
export const routes: RouteModule[] = [
  accountsCreate,
  accountsMe,
  accountsUser,
  applicationStatus,
  candidates,
  checkCandidateMatches,
  jobApplications,
  jobApply,
  jobDetail,
  jobReport,
  jobWithdraw,
  jobs,
  jobsMine,
  messagesConversation,
  messagesInbox,
  messagesList,
  messagesSend,
  notificationDetail,
  notificationRead,
  notifications,
  notificationsReadAll,
  notificationsUnread,
  profileMe,
  profilePublic,
  recommended,
  recommendedJob,
  reportReview,
  reports,
  savedSearchDelete,
  savedSearchRun,
  savedSearchToggle,
  savedSearches,
];
