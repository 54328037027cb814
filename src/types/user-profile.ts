/**
 * User profile group types
 */

/**
 * A managed profile attached to a parent user
 */
export interface ManagedProfile {
  userId: number;
  /** Paused (quiet mode) profiles are not running */
  running: boolean;
}

/**
 * A parent user and the managed profiles it owns. All per-source state is
 * addressed within one of these groups.
 */
export interface UserProfileGroup {
  profileParentUserId: number;
  managedProfiles: ManagedProfile[];
}

export function createUserProfileGroup(
  profileParentUserId: number,
  managedProfiles: ManagedProfile[] = []
): UserProfileGroup {
  return { profileParentUserId, managedProfiles };
}

export function getManagedProfileUserIds(group: UserProfileGroup): number[] {
  return group.managedProfiles.map(p => p.userId);
}

export function getManagedRunningProfileUserIds(group: UserProfileGroup): number[] {
  return group.managedProfiles.filter(p => p.running).map(p => p.userId);
}

export function isManagedUserRunning(group: UserProfileGroup, userId: number): boolean {
  return group.managedProfiles.some(p => p.userId === userId && p.running);
}

/**
 * Returns every user id of the group, parent first
 */
export function getAllUserIds(group: UserProfileGroup): number[] {
  return [group.profileParentUserId, ...getManagedProfileUserIds(group)];
}

export function containsUser(group: UserProfileGroup, userId: number): boolean {
  return getAllUserIds(group).includes(userId);
}
