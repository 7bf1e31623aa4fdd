/**
 * Person Domain Types
 *
 * People are owned by an external directory service and are read-only here.
 * Each person belongs to zero or more groups, with a proficiency level per
 * group.
 */

/**
 * Membership of a person in a group together with their proficiency level
 * in that group.
 */
export interface GroupLevel {
  groupId: string;
  level: number;
}

export interface Person {
  /** Directory identifier; also the chat user id on the gateway */
  id: string;

  fullName: string;

  /** Group memberships in directory order */
  groups: GroupLevel[];
}
