export { sync } from './sync.js'
export { install } from './install.js'
export { remove } from './remove.js'
export { update } from './update.js'
export { list } from './list.js'
export { status } from './status.js'
export { show } from './show.js'
export { bootstrap } from './bootstrap.js'
