export default {
  commands: {
    tempban: {
      description: '临时拉黑用户，禁止其使用 LLM 对话',
      usage: '@ 需要拉黑的用户。普通用户只能拉黑自己。',
      messages: {
        permission_denied: '权限不足。此命令仅限管理员使用。',
        banned: '已拉黑用户 {0}，时长 {1} 分钟。',
        self_banned: '你已被拉黑 {0} 分钟。',
        retaliated: '{0} 是管理员，你已被反拉黑 {1} 分钟。',
        no_target: '请 @ 需要拉黑的用户。',
        target_is_admin: '用户 {0} 是管理员，无法拉黑。',
        invalid_duration: '拉黑时长必须大于 0。',
        not_permitted: '你只能拉黑自己。',
        no_active_bans: '当前没有被拉黑的用户。',
        active_bans_list: '拉黑列表 ({0}):\n{1}',
        admins_list: '管理员 ({0}):\n{1}',
      }
    },
    'tempban.list': {
      description: '查看拉黑列表 (管理员)'
    },
    'tempban.admins': {
      description: '查看管理员列表 (管理员)'
    }
  }
}
