/**
 * Kinds of action a simulated agent can take. The clock never interprets
 * these; they only feed seed derivation as the action hint.
 */
export const ActionType = {
  EXIT: "exit",
  REFRESH: "refresh",
  SEARCH_USER: "search_user",
  SEARCH_POSTS: "search_posts",
  CREATE_POST: "create_post",
  LIKE_POST: "like_post",
  UNLIKE_POST: "unlike_post",
  DISLIKE_POST: "dislike_post",
  UNDO_DISLIKE_POST: "undo_dislike_post",
  REPORT_POST: "report_post",
  FOLLOW: "follow",
  UNFOLLOW: "unfollow",
  MUTE: "mute",
  UNMUTE: "unmute",
  TREND: "trend",
  SIGNUP: "sign_up",
  REPOST: "repost",
  QUOTE_POST: "quote_post",
  UPDATE_REC_TABLE: "update_rec_table",
  CREATE_COMMENT: "create_comment",
  LIKE_COMMENT: "like_comment",
  UNLIKE_COMMENT: "unlike_comment",
  DISLIKE_COMMENT: "dislike_comment",
  UNDO_DISLIKE_COMMENT: "undo_dislike_comment",
  DO_NOTHING: "do_nothing",
  PURCHASE_PRODUCT: "purchase_product",
  INTERVIEW: "interview",
  JOIN_GROUP: "join_group",
  LEAVE_GROUP: "leave_group",
  SEND_TO_GROUP: "send_to_group",
  CREATE_GROUP: "create_group",
  LISTEN_FROM_GROUP: "listen_from_group",
  // Friend-graph platforms
  SEND_FRIEND_REQUEST: "send_friend_request",
  ACCEPT_FRIEND_REQUEST: "accept_friend_request",
  REJECT_FRIEND_REQUEST: "reject_friend_request",
  UNFRIEND: "unfriend",
  GET_FRIEND_REQUESTS: "get_friend_requests",
  GET_FRIENDS: "get_friends",
  REACT_TO_POST: "react_to_post",
  REMOVE_REACTION: "remove_reaction",
  CREATE_GROUP_POST: "create_group_post",
  SHARE_TO_GROUP: "share_to_group",
} as const;

export type ActionType = (typeof ActionType)[keyof typeof ActionType];

/**
 * Anything accepted as an action hint. Known action types autocomplete;
 * any other string is still valid.
 */
export type ActionHint = ActionType | (string & {});

const ACTION_TYPE_VALUES: ReadonlySet<string> = new Set(Object.values(ActionType));

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPE_VALUES.has(value);
}

export type PlatformType = "twitter" | "reddit" | "facebook";

export const PLATFORM_TYPES = ["twitter", "reddit", "facebook"] as const satisfies readonly PlatformType[];

const DEFAULT_ACTIONS: Record<PlatformType, readonly ActionType[]> = {
  twitter: [
    ActionType.CREATE_POST,
    ActionType.LIKE_POST,
    ActionType.REPOST,
    ActionType.FOLLOW,
    ActionType.DO_NOTHING,
    ActionType.QUOTE_POST,
  ],
  reddit: [
    ActionType.LIKE_POST,
    ActionType.DISLIKE_POST,
    ActionType.CREATE_POST,
    ActionType.CREATE_COMMENT,
    ActionType.LIKE_COMMENT,
    ActionType.DISLIKE_COMMENT,
    ActionType.SEARCH_POSTS,
    ActionType.SEARCH_USER,
    ActionType.TREND,
    ActionType.REFRESH,
    ActionType.DO_NOTHING,
    ActionType.FOLLOW,
    ActionType.MUTE,
  ],
  facebook: [
    ActionType.CREATE_POST,
    ActionType.CREATE_GROUP_POST,
    ActionType.REACT_TO_POST,
    ActionType.SEND_FRIEND_REQUEST,
    ActionType.ACCEPT_FRIEND_REQUEST,
    ActionType.CREATE_COMMENT,
    ActionType.JOIN_GROUP,
    ActionType.SHARE_TO_GROUP,
    ActionType.REFRESH,
    ActionType.DO_NOTHING,
  ],
};

/** Default action set offered to agents on a platform. */
export function defaultActionsFor(platform: PlatformType): ActionType[] {
  return [...DEFAULT_ACTIONS[platform]];
}
