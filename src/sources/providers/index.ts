import type { SourceDescriptor } from '../types.js';
import { alipay } from './alipay.js';
import { amazon } from './amazon.js';
import { baidu } from './baidu.js';
import { coding } from './coding.js';
import { dingtalk } from './dingtalk.js';
import { douyin } from './douyin.js';
import { eleme } from './eleme.js';
import { facebook } from './facebook.js';
import { feishu } from './feishu.js';
import { gitee } from './gitee.js';
import { github } from './github.js';
import { gitlab } from './gitlab.js';
import { google } from './google.js';
import { huawei } from './huawei.js';
import { jd } from './jd.js';
import { kujiale } from './kujiale.js';
import { line } from './line.js';
import { linkedin } from './linkedin.js';
import { meituan } from './meituan.js';
import { microsoft } from './microsoft.js';
import { oschina } from './oschina.js';
import { pinterest } from './pinterest.js';
import { qq } from './qq.js';
import { renren } from './renren.js';
import { slack } from './slack.js';
import { stackOverflow } from './stack-overflow.js';
import { taobao } from './taobao.js';
import { teambition } from './teambition.js';
import { tencentCloud } from './tencent-cloud.js';
import { toutiao } from './toutiao.js';
import { twitter } from './twitter.js';
import { wechatEnterprise } from './wechat-enterprise.js';
import { wechat, wechatMini, wechatOpen } from './wechat.js';
import { weibo } from './weibo.js';
import { xmly } from './xmly.js';
import { zxxk } from './zxxk.js';

export {
  alipay,
  amazon,
  baidu,
  coding,
  dingtalk,
  douyin,
  eleme,
  facebook,
  feishu,
  gitee,
  github,
  gitlab,
  google,
  huawei,
  jd,
  kujiale,
  line,
  linkedin,
  meituan,
  microsoft,
  oschina,
  pinterest,
  qq,
  renren,
  slack,
  stackOverflow,
  taobao,
  teambition,
  tencentCloud,
  toutiao,
  twitter,
  wechat,
  wechatEnterprise,
  wechatMini,
  wechatOpen,
  weibo,
  xmly,
  zxxk,
};
export { alipaySigningContent, alipayTimestamp, signAlipayParams } from './alipay.js';
export { signDingtalkTimestamp } from './dingtalk.js';
export { signJdParams } from './jd.js';
export { signMeituanRequest } from './meituan.js';
export { signZxxkParams, zxxkEncrypt, zxxkServiceUrl } from './zxxk.js';

/**
 * Every source shipped with the library, keyed by `name` in the registry.
 */
export const BUILTIN_SOURCES: readonly SourceDescriptor[] = Object.freeze([
  github,
  gitee,
  gitlab,
  google,
  microsoft,
  facebook,
  linkedin,
  weibo,
  baidu,
  qq,
  wechat,
  wechatOpen,
  wechatMini,
  feishu,
  douyin,
  toutiao,
  alipay,
  twitter,
  slack,
  line,
  amazon,
  huawei,
  coding,
  oschina,
  stackOverflow,
  pinterest,
  dingtalk,
  wechatEnterprise,
  taobao,
  jd,
  tencentCloud,
  teambition,
  renren,
  kujiale,
  meituan,
  eleme,
  xmly,
  zxxk,
]);
