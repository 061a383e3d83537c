export default {
  commands: {
    tempban: {
      description: 'Temporarily block a user from the chat model',
      usage: 'Mention the user to ban. Normal users may only ban themselves.',
      messages: {
        permission_denied: 'Permission denied. This command is for administrators only.',
        banned: 'User {0} is banned for {1} min.',
        self_banned: 'You are banned for {0} min.',
        retaliated: '{0} is an administrator. You are banned for {1} min instead.',
        no_target: 'Please mention the user to ban.',
        target_is_admin: 'User {0} is an administrator and cannot be banned.',
        invalid_duration: 'Duration must be greater than 0.',
        not_permitted: 'You may only ban yourself.',
        no_active_bans: 'No active bans.',
        active_bans_list: 'Active bans ({0}):\n{1}',
        admins_list: 'Administrators ({0}):\n{1}',
      }
    },
    'tempban.list': {
      description: 'List active bans (Admin)'
    },
    'tempban.admins': {
      description: 'List administrators (Admin)'
    }
  }
}
